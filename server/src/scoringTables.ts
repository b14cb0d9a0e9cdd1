import fs from "node:fs";
import { z } from "zod";
import { defaultScoringTablesPath } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { log } from "./logger";

const Points = z.number().nonnegative();
const Weight = z.number().min(0).max(1);

const MinTier = z.object({ min: z.number(), points: Points });
const TermGroup = z.object({ weight: Points, terms: z.array(z.string().min(1)) });

const RecommendationLabel = z.enum(["Strong Match", "Good Match", "Moderate Match", "Weak Match"]);

const ScoringTablesSchema = z.object({
  version: z.string(),
  quality: z.object({
    weights: z.object({ founders: Weight, company: Weight, team: Weight }),
    experience: z.object({
      cap: Points,
      prestigiousCompanies: TermGroup,
      keywords: TermGroup,
      yearsTiers: z.array(MinTier),
    }),
    education: z.object({
      cap: Points,
      universities: TermGroup,
      advancedDegrees: TermGroup,
      fields: TermGroup,
    }),
    honors: z.object({
      cap: Points,
      doctoralBonus: Points,
      doctoralMarkers: z.array(z.string().min(1)),
      points: z.record(z.string(), Points),
    }),
    network: z.object({
      cap: Points,
      connectionTiers: z.array(MinTier),
      endorsementTiers: z.array(MinTier),
    }),
    company: z.object({
      cap: Points,
      descriptionLengthTiers: z.array(MinTier),
      industryBonus: Points,
      industryKeywords: z.array(z.string().min(1)),
      locationBonus: Points,
      topLocations: z.array(z.string().min(1)),
      ageTiers: z.array(z.object({ maxExclusive: z.number(), points: Points })),
    }),
    team: z.object({
      cap: Points,
      founderCountTiers: z.array(MinTier),
      diversityTiers: z.array(MinTier),
      coreRoleTiers: z.array(MinTier),
      roleClasses: z.object({
        ceo: z.array(z.string().min(1)),
        cto: z.array(z.string().min(1)),
        product: z.array(z.string().min(1)),
        operations: z.array(z.string().min(1)),
        finance: z.array(z.string().min(1)),
      }),
      cofounderMarkers: z.array(z.string().min(1)),
    }),
  }),
  fit: z.object({
    weights: z.object({ textSimilarity: Weight, industry: Weight, stage: Weight, location: Weight, network: Weight }),
    matchCredit: z.object({ exact: Points, partial: Points }),
    candidateTextFounders: z.number().int().nonnegative(),
    founderExperienceChars: z.number().int().positive(),
    stageOrder: z.array(z.string().min(1)).min(1),
    stageKeywords: z.record(z.string(), z.array(z.string().min(1))),
    relatedIndustries: z.record(z.string(), z.array(z.string().min(1))),
    regions: z.record(z.string(), z.array(z.string().min(1))),
  }),
  conflict: z.object({
    nameSimilarityMin: z.number().min(0).max(1),
    industryOverlapScore: z.number().min(0).max(100),
  }),
  overall: z.object({
    weights: z.object({ fit: Weight, quality: Weight, portfolioFit: Weight }),
    recommendationTiers: z.array(z.object({ min: z.number(), label: RecommendationLabel })),
    fallbackLabel: RecommendationLabel,
  }),
});

export type ScoringTables = z.infer<typeof ScoringTablesSchema>;
export type RoleClass = keyof ScoringTables["quality"]["team"]["roleClasses"];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function parseScoringTables(raw: unknown): ScoringTables {
  const parsed = ScoringTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `scoring tables ${i.path.join(".")}: ${i.message}`));
  }
  const stages = parsed.data.fit.stageOrder;
  const unknownStages = Object.keys(parsed.data.fit.stageKeywords).filter((s) => !stages.includes(s));
  if (unknownStages.length) {
    throw new ConfigError([`scoring tables fit.stageKeywords: stages not in stageOrder: ${unknownStages.join(", ")}`]);
  }
  return deepFreeze(parsed.data);
}

export function loadScoringTables(filePath: string = defaultScoringTablesPath()): ScoringTables {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError([`scoring tables not found at ${filePath}`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigError([`scoring tables at ${filePath} are not valid JSON: ${errorMessage(e)}`]);
  }
  const tables = parseScoringTables(raw);
  log.info("Scoring tables loaded", { filePath, version: tables.version });
  return tables;
}
