import { describePlugin, type PluginSpec, type ResolvedPlugin } from "@strand/core"
import { consola } from "consola"
import type { InstallEntry, InstallOutcome, InstallReport } from "@/src/core/install/types"

export interface ReportSummary {
	total: number
	installed: number
	failed: number
}

export function summarizeReport(report: InstallReport): ReportSummary {
	const installed = report.filter((entry) => entry.outcome.status === "installed").length
	return {
		failed: report.length - installed,
		installed,
		total: report.length,
	}
}

/**
 * One-line reason for a failed outcome, or null when the plugin was installed.
 */
export function describeFailure(outcome: InstallOutcome): string | null {
	switch (outcome.status) {
		case "installed":
			return null
		case "fetch_failed":
			return `download failed (${outcome.error.url}): ${outcome.error.message}`
		case "extract_failed":
			return `extraction failed: ${outcome.error.message}`
		case "conflict":
			return `directory name is already used by plugin #${outcome.claimedBy + 1}`
	}
}

export function logInstallStart(spec: PluginSpec, resolved: ResolvedPlugin): void {
	consola.start(`Installing ${resolved.destName} (${describePlugin(spec)})`)
}

export function logInstallComplete(entry: InstallEntry): void {
	const reason = describeFailure(entry.outcome)
	if (reason === null) {
		consola.success(`Installed ${entry.resolved.destName}`)
		return
	}

	consola.error(`Failed ${entry.resolved.destName}: ${reason}`)
}

export function printReport(report: InstallReport): ReportSummary {
	const summary = summarizeReport(report)

	if (summary.total === 0) {
		consola.info("No plugins configured.")
		return summary
	}

	if (summary.failed === 0) {
		consola.success(`Installed ${summary.installed} of ${summary.total} plugin(s).`)
		return summary
	}

	consola.warn(`Installed ${summary.installed} of ${summary.total} plugin(s).`)
	for (const entry of report) {
		const reason = describeFailure(entry.outcome)
		if (reason !== null) {
			consola.error(`${describePlugin(entry.spec)}: ${reason}`)
		}
	}
	consola.info("Failed plugins are not retried; run strand again to retry them.")

	return summary
}
