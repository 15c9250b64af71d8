import { type StepName, isStepName } from "@nock-provision/shared";

export interface ParsedStepList {
	steps: StepName[];
	unknown: string[];
}

/**
 * Parse a comma-separated step list. Names are case-insensitive and
 * accept dashes for underscores, so "mining-key" means MINING_KEY.
 */
export function parseStepList(value: string): ParsedStepList {
	const steps: StepName[] = [];
	const unknown: string[] = [];

	for (const raw of value.split(",")) {
		const name = raw.trim().toUpperCase().replace(/-/g, "_");
		if (name === "") {
			continue;
		}
		if (isStepName(name)) {
			if (!steps.includes(name)) {
				steps.push(name);
			}
		} else {
			unknown.push(raw.trim());
		}
	}

	return { steps, unknown };
}
