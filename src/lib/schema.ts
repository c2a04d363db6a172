import { z } from "zod";

/** Accepts a finite number or a numeric string, as chain APIs mix both. */
export const numeric = z
	.union([z.number(), z.string()])
	.transform((value, ctx) => {
		const parsed =
			typeof value === "number"
				? value
				: value.trim() === ""
					? Number.NaN
					: Number(value);
		if (!Number.isFinite(parsed)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `expected a numeric value, received ${JSON.stringify(value)}`,
			});
			return z.NEVER;
		}
		return parsed;
	});

export const nonNegative = numeric.pipe(z.number().nonnegative());

/** Integer amount in a denom's base units; strings keep precision past 2^53. */
export const baseUnits = z
	.union([
		z.string().trim().regex(/^\d+$/, "expected an unsigned integer"),
		z.number().int().nonnegative(),
	])
	.transform((value) => BigInt(value));
