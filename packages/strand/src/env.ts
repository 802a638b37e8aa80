export const STRAND_CONFIG_DIR = normalizeDir(process.env.STRAND_CONFIG_DIR)
export const XDG_CONFIG_HOME = normalizeDir(process.env.XDG_CONFIG_HOME)
export const APPDATA = normalizeDir(process.env.APPDATA)

function normalizeDir(value: string | undefined): string | undefined {
	const trimmed = value?.trim()
	return trimmed ? trimmed : undefined
}
