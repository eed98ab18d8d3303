import { confirm, isCancel, select } from "@clack/prompts"
import { consola } from "consola"
import type { ChoiceOption, Prompter } from "@/world/prompter"

export function createTerminalPrompter(): Prompter {
	return {
		async choose(message, options) {
			const selected = await select<number>({
				message,
				options: options.map((option, index) => ({
					hint: option.hint,
					label: option.label,
					value: index,
				})),
			})
			if (isCancel(selected)) {
				return null
			}
			return selected
		},
		async confirm(message, defaultValue) {
			const answer = await confirm({ initialValue: defaultValue, message })
			if (isCancel(answer)) {
				return false
			}
			return answer
		},
	}
}

/**
 * Answers from command-line flags. Choices are never made for the operator:
 * without an explicit world the selection is declined.
 */
export function createFlagPrompter(options: { yes: boolean }): Prompter {
	return {
		async choose(message: string, _options: readonly ChoiceOption[]) {
			consola.warn(`${message}: no world given and prompts are disabled.`)
			return null
		},
		async confirm(message, defaultValue) {
			const answer = options.yes || defaultValue
			consola.info(`${message} ${answer ? "yes" : "no"} (non-interactive)`)
			return answer
		},
	}
}
