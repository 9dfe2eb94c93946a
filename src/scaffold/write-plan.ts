import { TemplateError } from "./errors.js";
import type { TemplateSource } from "./template-source.js";

interface SourcedWrite {
	destination: string;
	sourceRoot: string;
	relativePath: string;
}

export type PlannedWrite =
	| { kind: "directory"; destination: string }
	| (SourcedWrite & { kind: "copy" })
	| (SourcedWrite & { kind: "render" });

/**
 * Merge sources, in priority order, into one list of writes keyed by
 * destination. A later source's file replaces an earlier one in place;
 * directories merge.
 */
export function buildWritePlan(
	sources: readonly TemplateSource[],
): PlannedWrite[] {
	const plan = new Map<string, PlannedWrite>();

	for (const source of sources) {
		for (const entry of source.entries) {
			const existing = plan.get(entry.destination);
			const isDirectory = entry.kind === "directory";

			if (existing && (existing.kind === "directory") !== isDirectory) {
				throw new TemplateError(
					`"${entry.destination}" is a directory in one template ` +
						"and a file in another",
					`${source.root}/${entry.relativePath}`,
				);
			}

			if (isDirectory) {
				if (!existing) {
					plan.set(entry.destination, {
						kind: "directory",
						destination: entry.destination,
					});
				}
				continue;
			}

			plan.set(entry.destination, {
				kind: entry.kind === "template" ? "render" : "copy",
				destination: entry.destination,
				sourceRoot: source.root,
				relativePath: entry.relativePath,
			});
		}
	}

	return [...plan.values()];
}
