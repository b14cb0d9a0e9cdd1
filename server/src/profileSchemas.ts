import { z } from "zod";
import { MalformedInputError, type InputIssue } from "./errors";
import type { CompanyProfile, OrganizationProfile } from "./types";

// Free text is optional everywhere; anything that isn't a string reads as empty.
const Text = z.string().catch("");
const Count = z.coerce
  .number()
  .catch(0)
  .transform((n) => (Number.isFinite(n) && n > 0 ? Math.floor(n) : 0));
const Name = z.string({ required_error: "name is required" }).trim().min(1, "name is required");
// non-string entries are dropped one by one; a non-array reads as empty
const TextList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((i): i is string => typeof i === "string"));

const FounderSchema = z.object({
  name: Name,
  title: Text,
  experience: Text,
  education: Text,
  honors: Text,
  linkedinConnections: Count,
  endorsements: Count,
});

const CompanySchema = z.object({
  name: Name,
  description: Text,
  industry: Text,
  location: Text,
  foundedYear: z.number().int().optional().catch(undefined),
  fundingStage: z.string().optional().catch(undefined),
  founders: z.array(FounderSchema).default([]),
});

const HoldingSchema = z.union([
  z
    .string()
    .trim()
    .min(1)
    .transform((name) => ({ name })),
  z.object({
    name: Name,
    description: z.string().optional(),
    industry: z.string().optional(),
  }),
]);

const OrganizationSchema = z.object({
  name: Name,
  thesis: Text,
  preferredIndustries: TextList,
  preferredStages: TextList,
  preferredLocations: TextList,
  portfolio: z.array(HoldingSchema).default([]),
});

/**
 * Validates every candidate before any is scored. All offending indices are
 * reported together.
 */
export function parseCandidates(raw: readonly unknown[]): CompanyProfile[] {
  const issues: InputIssue[] = [];
  const out: CompanyProfile[] = [];
  raw.forEach((item, index) => {
    const parsed = CompanySchema.safeParse(item);
    if (parsed.success) {
      out.push(parsed.data);
      return;
    }
    for (const i of parsed.error.issues) {
      issues.push({ index, path: i.path.join(".") || "(root)", message: i.message });
    }
  });
  if (issues.length) throw new MalformedInputError(issues);
  return out;
}

export function parseOrganization(raw: unknown): OrganizationProfile {
  const parsed = OrganizationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedInputError(
      parsed.error.issues.map((i) => ({ index: -1, path: ["organization", ...i.path].join("."), message: i.message }))
    );
  }
  return parsed.data;
}
