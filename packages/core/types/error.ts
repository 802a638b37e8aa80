export interface BaseError {
	type: string
	message: string
}

export type ValidationError = BaseError & {
	type: "validation"
	source: "manual"
	/** Part of the declaration that was rejected: plugin, git, provider, ref, owner, repo or archive */
	field: string
}

export type CoreError = ValidationError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
