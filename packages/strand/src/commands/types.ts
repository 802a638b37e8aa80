// CommandResult models user-facing flow outcomes; core operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "failed"; message: string }

export const CommandResult = {
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (message: string): CommandResult<never> => ({ message, status: "failed" }),
} as const
