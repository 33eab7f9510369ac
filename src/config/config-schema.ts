import * as z from "zod";
import { assertSafeRepositoryId } from "../repo-id";

const ArchitectureSchema = z
	.string()
	.min(1)
	.regex(/^[A-Za-z0-9_.+-]+$/, { message: "invalid architecture name" });

const CommonOptionsSchema = z.object({
	archs: z.array(ArchitectureSchema),
	timeoutMs: z.number().int().min(1).optional(),
});

export const DefaultsSchema = CommonOptionsSchema.strict();

export const RepositorySchema = CommonOptionsSchema.partial()
	.extend({
		id: z
			.string()
			.min(1)
			.superRefine((value, ctx) => {
				try {
					assertSafeRepositoryId(value, "id");
				} catch (error) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						message:
							error instanceof Error ? error.message : "Invalid repository id.",
					});
				}
			}),
		url: z
			.string()
			.url()
			.refine((value) => /^https?:\/\//i.test(value), {
				message: "url must use http or https",
			}),
	})
	.strict();

export const ResolvedRepositorySchema = RepositorySchema.extend(
	CommonOptionsSchema.shape,
).strict();

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		storageDir: z.string().min(1).optional(),
		defaults: DefaultsSchema.partial().optional(),
		repositories: z.array(RepositorySchema),
	})
	.strict()
	.superRefine((value, ctx) => {
		const seen = new Set<string>();
		const duplicates = new Set<string>();
		value.repositories.forEach((repository) => {
			if (seen.has(repository.id)) {
				duplicates.add(repository.id);
			} else {
				seen.add(repository.id);
			}
		});
		if (duplicates.size > 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["repositories"],
				message: `Duplicate repository IDs found: ${Array.from(duplicates).join(", ")}.`,
			});
		}
	});

export type MirrorDefaults = z.infer<typeof DefaultsSchema>;
export type MirrorRepository = z.infer<typeof RepositorySchema>;
export type MirrorResolvedRepository = z.infer<typeof ResolvedRepositorySchema>;
export type MirrorConfig = z.infer<typeof ConfigSchema>;
