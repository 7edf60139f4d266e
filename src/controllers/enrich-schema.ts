import { z } from "zod";
import { FilterCriteria, MAX_ASN } from "../services/result-filter";

const textList = z.array(z.string().trim().min(1)).optional();

export const excludeSchema = z
  .object({
    countries: textList,
    cities: textList,
    asns: z.array(z.number().int().min(0).max(MAX_ASN)).optional(),
    orgs: textList,
    orgManaged: z.boolean().optional(),
    notOrgManaged: z.boolean().optional(),
    platforms: textList,
    orgIds: textList,
  })
  .strict();

export const enrichBodySchema = z
  .object({
    addresses: z.array(z.string()).optional(),
    text: z.string().optional(),
    exclude: excludeSchema.optional(),
    sortBy: z.string().optional(),
    format: z.enum(["json", "csv"]).default("json"),
  })
  .refine((body) => (body.addresses?.length ?? 0) > 0 || !!body.text, {
    message: "Provide at least one address or a text to scan",
  });

export type ExcludeInput = z.infer<typeof excludeSchema>;

export function toFilterCriteria(exclude: ExcludeInput = {}): FilterCriteria {
  return new FilterCriteria({
    excludeCountries: exclude.countries,
    excludeCities: exclude.cities,
    excludeAsns: exclude.asns,
    excludeOrgs: exclude.orgs,
    excludeOrgManaged: exclude.orgManaged,
    excludeNotOrgManaged: exclude.notOrgManaged,
    excludePlatforms: exclude.platforms,
    excludeOrgIds: exclude.orgIds,
  });
}

/**
 * Flatten zod issues into one line for an error response
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}
