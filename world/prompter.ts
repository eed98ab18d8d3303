/**
 * Operator decisions the setup flow needs. The flow only talks to this
 * interface, so it can run against a terminal, command-line flags or a test.
 */
export interface ChoiceOption {
	label: string
	hint?: string
}

export interface Prompter {
	/** Index of the chosen option, or null when the operator backs out. */
	choose(message: string, options: readonly ChoiceOption[]): Promise<number | null>
	/** Yes/no; `defaultValue` applies when no answer is given. */
	confirm(message: string, defaultValue: boolean): Promise<boolean>
}
