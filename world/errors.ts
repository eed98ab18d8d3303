import type { WorldError } from "@/types/error"
import type { SetupResult, SetupStage } from "@/world/types"

export function failSetup(stage: SetupStage, error: WorldError): SetupResult<never> {
	return {
		error: {
			...error,
			cause: error,
			message: `Setup failed at ${stage}.`,
			stage,
		},
		ok: false,
	}
}
