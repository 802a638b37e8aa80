/**
 * Integration tests for installAll/installInto
 *
 * Real archives and a real filesystem under a temporary directory; only fetch is
 * replaced by an in-process stand-in.
 */

import { mkdir, stat, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { installAll, installInto, planInstalls } from "@/src/core/install/coordinator"
import type { InstallEntry } from "@/src/core/install/types"
import {
	abs,
	buildPluginArchive,
	createFakeFetch,
	exists,
	type FakeRoute,
	listDir,
	readTree,
	spec,
	withTempDir,
} from "@/tests/helpers"

const ALPHA_URL = "https://codeload.github.com/someone/alpha/tar.gz/HEAD"
const BETA_URL = "https://example.com/files/beta.tar.gz"
const GAMMA_URL = "https://bitbucket.org/team/gamma/get/v2.tar.gz"

async function standardRoutes(): Promise<Record<string, FakeRoute>> {
	return {
		[ALPHA_URL]: {
			body: await buildPluginArchive("alpha-main", {
				"plugin/alpha.vim": "let g:alpha = 1\n",
			}),
		},
		[BETA_URL]: {
			body: await buildPluginArchive("beta-1.0", { "doc/beta.txt": "*beta*\n" }),
		},
		[GAMMA_URL]: {
			body: await buildPluginArchive("team-gamma-abc123", { "init.lua": "return {}\n" }),
		},
	}
}

const STANDARD_SPECS = [
	spec("someone/alpha"),
	spec(BETA_URL),
	spec("bitbucket@team/gamma:v2"),
]

describe("installAll", () => {
	it("installs every plugin into its own directory", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const fake = createFakeFetch(await standardRoutes())

			const result = await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value.map((entry) => entry.outcome)).toEqual([
				{ destination: join(pluginDir, "alpha"), status: "installed" },
				{ destination: join(pluginDir, "beta"), status: "installed" },
				{ destination: join(pluginDir, "gamma"), status: "installed" },
			])
			expect(await readTree(pluginDir)).toEqual({
				[join("alpha", "plugin", "alpha.vim")]: "let g:alpha = 1\n",
				[join("beta", "doc", "beta.txt")]: "*beta*\n",
				[join("gamma", "init.lua")]: "return {}\n",
			})
			expect([...fake.calls].sort()).toEqual([ALPHA_URL, BETA_URL, GAMMA_URL].sort())
		})
	})

	it("reports in input order with the spec and resolution attached", async () => {
		await withTempDir(async (dir) => {
			const fake = createFakeFetch(await standardRoutes())

			const result = await installAll(STANDARD_SPECS, abs(join(dir, "plugins")), {
				fetch: fake.fetch,
			})

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value.map((entry) => entry.spec)).toEqual(STANDARD_SPECS)
			expect(result.value.map((entry) => entry.resolved.archiveUrl)).toEqual([
				ALPHA_URL,
				BETA_URL,
				GAMMA_URL,
			])
		})
	})

	it("produces the same tree when run twice", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const fake = createFakeFetch(await standardRoutes())

			await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })
			const first = await readTree(pluginDir)
			await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(await readTree(pluginDir)).toEqual(first)
			expect(await listDir(pluginDir)).toEqual(["alpha", "beta", "gamma"])
		})
	})

	it("removes plugins that are no longer configured", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await mkdir(join(pluginDir, "old-plugin"), { recursive: true })
			await writeFile(join(pluginDir, "old-plugin", "old.vim"), "old\n")
			await writeFile(join(pluginDir, "stray.txt"), "stray\n")
			const fake = createFakeFetch(await standardRoutes())

			await installAll([spec("someone/alpha")], pluginDir, { fetch: fake.fetch })

			expect(await listDir(pluginDir)).toEqual(["alpha"])
		})
	})

	it("empties the directory when no plugins are configured", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await mkdir(join(pluginDir, "old-plugin"), { recursive: true })
			const fake = createFakeFetch({})

			const result = await installAll([], pluginDir, { fetch: fake.fetch })

			expect(result).toEqual({ ok: true, value: [] })
			expect(await listDir(pluginDir)).toEqual([])
			expect(fake.calls).toEqual([])
		})
	})

	it("replaces a file sitting at the plugin directory path", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await writeFile(pluginDir, "not a directory\n")
			const fake = createFakeFetch(await standardRoutes())

			const result = await installAll([spec("someone/alpha")], pluginDir, {
				fetch: fake.fetch,
			})

			expect(result.ok).toBe(true)
			expect((await stat(pluginDir)).isDirectory()).toBe(true)
			expect(await listDir(pluginDir)).toEqual(["alpha"])
		})
	})

	it("fails the run when the plugin directory cannot be created", async () => {
		await withTempDir(async (dir) => {
			const blocker = join(dir, "blocker")
			await writeFile(blocker, "file\n")
			const pluginDir = abs(join(blocker, "plugins"))
			const fake = createFakeFetch(await standardRoutes())

			const result = await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(false)
			if (result.ok) return
			expect(result.error.type).toBe("directory_setup")
			expect(result.error.path).toBe(pluginDir)
			expect(fake.calls).toEqual([])
		})
	})

	it("keeps going when one plugin cannot be downloaded", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const routes = await standardRoutes()
			delete routes[BETA_URL]
			const fake = createFakeFetch(routes)

			const result = await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value.map((entry) => entry.outcome.status)).toEqual([
				"installed",
				"fetch_failed",
				"installed",
			])
			expect(result.value[1]?.outcome).toEqual({
				error: {
					message: "fetch failed: getaddrinfo ENOTFOUND example.com",
					status: undefined,
					type: "network",
					url: BETA_URL,
				},
				status: "fetch_failed",
			})
			expect(await listDir(pluginDir)).toEqual(["alpha", "gamma"])
		})
	})

	it("reports HTTP errors per plugin", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const routes = await standardRoutes()
			routes[ALPHA_URL] = { status: 404 }
			const fake = createFakeFetch(routes)

			const result = await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			const alpha = result.value[0]?.outcome
			expect(alpha?.status).toBe("fetch_failed")
			if (alpha?.status === "fetch_failed") {
				expect(alpha.error.status).toBe(404)
			}
			expect(await listDir(pluginDir)).toEqual(["beta", "gamma"])
		})
	})

	it("leaves nothing behind for a plugin whose archive is corrupt", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const routes = await standardRoutes()
			routes[ALPHA_URL] = { body: Buffer.from("<html>rate limited</html>") }
			const fake = createFakeFetch(routes)

			const result = await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			const alpha = result.value[0]?.outcome
			expect(alpha?.status).toBe("extract_failed")
			if (alpha?.status === "extract_failed") {
				expect(alpha.error.type).toBe("corrupt_archive")
			}
			// No staging directories and no partial plugin.
			expect(await listDir(pluginDir)).toEqual(["beta", "gamma"])
		})
	})

	it("never has more than `concurrency` plugins between start and finish", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const body = await buildPluginArchive("p-main", { "a.vim": "a\n".repeat(2000) })
			const routes: Record<string, FakeRoute> = {}
			const specs = Array.from({ length: 120 }, (_, index) => {
				const url = `https://example.com/p/plugin-${index}.tar.gz`
				routes[url] = { body, chunkDelayMs: 1, chunks: 3 }
				return spec(url)
			})
			const fake = createFakeFetch(routes)
			let active = 0
			let peak = 0

			const result = await installAll(specs, pluginDir, {
				concurrency: 4,
				fetch: fake.fetch,
				onComplete: () => {
					active -= 1
				},
				onStart: () => {
					active += 1
					peak = Math.max(peak, active)
				},
			})

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value).toHaveLength(120)
			expect(result.value.every((entry) => entry.outcome.status === "installed")).toBe(
				true,
			)
			expect(peak).toBe(4)
			expect(fake.maxInFlight()).toBeLessThanOrEqual(4)
			expect(fake.calls).toHaveLength(120)
			expect(await listDir(pluginDir)).toHaveLength(120)
		})
	})

	it("installs a slow download that keeps making progress", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const fake = createFakeFetch({
				[ALPHA_URL]: {
					body: await buildPluginArchive("alpha-main", { "plugin/alpha.vim": "x\n" }),
					chunkDelayMs: 40,
					chunks: 8,
				},
			})

			const result = await installAll([spec("someone/alpha")], pluginDir, {
				fetch: fake.fetch,
				timeoutMs: 150,
			})

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value[0]?.outcome).toEqual({
				destination: join(pluginDir, "alpha"),
				status: "installed",
			})
		})
	})

	it("reports a connection dropped mid-download as a download failure", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const routes = await standardRoutes()
			routes[ALPHA_URL] = {
				body: await buildPluginArchive("alpha-main", {
					"plugin/alpha.vim": "let g:alpha = 1\n".repeat(4000),
				}),
				chunks: 4,
				dropAfterChunks: 2,
			}
			const fake = createFakeFetch(routes)

			const result = await installAll(STANDARD_SPECS, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value[0]?.outcome).toEqual({
				error: {
					message: "Archive download was interrupted: terminated",
					type: "network",
					url: ALPHA_URL,
				},
				status: "fetch_failed",
			})
			expect(await listDir(pluginDir)).toEqual(["beta", "gamma"])
		})
	})

	it("reports a download that stops sending data as a download failure", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const fake = createFakeFetch({
				[ALPHA_URL]: {
					body: await buildPluginArchive("alpha-main", { "plugin/alpha.vim": "x\n" }),
					chunkDelayMs: 300,
					chunks: 2,
				},
			})

			const result = await installAll([spec("someone/alpha")], pluginDir, {
				fetch: fake.fetch,
				timeoutMs: 50,
			})

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value[0]?.outcome).toEqual({
				error: {
					message: "Archive download was interrupted: No data received for 50ms.",
					type: "network",
					url: ALPHA_URL,
				},
				status: "fetch_failed",
			})
			expect(await listDir(pluginDir)).toEqual([])
		})
	})

	it("reports later plugins that want an already claimed directory", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			const fake = createFakeFetch(await standardRoutes())
			const specs = [
				spec("someone/alpha"),
				spec("gitlab@other/alpha"),
				spec(BETA_URL),
			]

			const result = await installAll(specs, pluginDir, { fetch: fake.fetch })

			expect(result.ok).toBe(true)
			if (!result.ok) return
			expect(result.value[1]?.outcome).toEqual({ claimedBy: 0, status: "conflict" })
			expect(fake.calls).not.toContain(
				"https://gitlab.com/other/alpha/-/archive/HEAD/alpha-HEAD.tar.gz",
			)
			expect(await readTree(pluginDir)).toEqual({
				[join("alpha", "plugin", "alpha.vim")]: "let g:alpha = 1\n",
				[join("beta", "doc", "beta.txt")]: "*beta*\n",
			})
		})
	})

	it("calls the progress hooks once per plugin", async () => {
		await withTempDir(async (dir) => {
			const fake = createFakeFetch(await standardRoutes())
			const started: string[] = []
			const completed: InstallEntry[] = []
			const specs = [...STANDARD_SPECS, spec("gitlab@x/alpha")]

			await installAll(specs, abs(join(dir, "plugins")), {
				fetch: fake.fetch,
				onComplete: (entry) => completed.push(entry),
				onStart: (_spec, resolved) => started.push(resolved.destName),
			})

			expect([...started].sort()).toEqual(["alpha", "beta", "gamma"])
			expect(completed).toHaveLength(4)
		})
	})
})

describe("installInto", () => {
	it("keeps plugins it was not asked to install", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await mkdir(join(pluginDir, "mine"), { recursive: true })
			await writeFile(join(pluginDir, "mine", "mine.vim"), "mine\n")
			const fake = createFakeFetch(await standardRoutes())

			const result = await installInto([spec("someone/alpha")], pluginDir, {
				fetch: fake.fetch,
			})

			expect(result.ok).toBe(true)
			expect(await readTree(pluginDir)).toEqual({
				[join("alpha", "plugin", "alpha.vim")]: "let g:alpha = 1\n",
				[join("mine", "mine.vim")]: "mine\n",
			})
		})
	})

	it("replaces an existing copy of the same plugin", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await mkdir(join(pluginDir, "alpha"), { recursive: true })
			await writeFile(join(pluginDir, "alpha", "stale.vim"), "stale\n")
			const fake = createFakeFetch(await standardRoutes())

			await installInto([spec("someone/alpha")], pluginDir, { fetch: fake.fetch })

			expect(await exists(join(pluginDir, "alpha", "stale.vim"))).toBe(false)
			expect(await exists(join(pluginDir, "alpha", "plugin", "alpha.vim"))).toBe(true)
		})
	})

	it("keeps the existing copy when the new download fails", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await mkdir(join(pluginDir, "alpha"), { recursive: true })
			await writeFile(join(pluginDir, "alpha", "old.vim"), "old\n")
			const fake = createFakeFetch({ [ALPHA_URL]: { status: 500 } })

			const result = await installInto([spec("someone/alpha")], pluginDir, {
				fetch: fake.fetch,
			})

			expect(result.ok).toBe(true)
			expect(await readTree(pluginDir)).toEqual({ [join("alpha", "old.vim")]: "old\n" })
		})
	})

	it("refuses a plugin directory path that is a file", async () => {
		await withTempDir(async (dir) => {
			const pluginDir = abs(join(dir, "plugins"))
			await writeFile(pluginDir, "file\n")

			const result = await installInto([spec("someone/alpha")], pluginDir, {
				fetch: createFakeFetch({}).fetch,
			})

			expect(result).toEqual({
				error: {
					message: `Unable to prepare plugin directory ${pluginDir}: Expected directory at ${pluginDir}.`,
					operation: "mkdir",
					path: pluginDir,
					type: "directory_setup",
				},
				ok: false,
			})
		})
	})
})

describe("planInstalls", () => {
	it("lets the first spec claim a directory name", () => {
		const planned = planInstalls([
			spec("a/same"),
			spec("b/other"),
			spec("https://example.com/same.tar.gz"),
			spec("c/same"),
		])

		expect(planned.map((plan) => plan.claimedBy)).toEqual([null, null, 0, 0])
	})
})
