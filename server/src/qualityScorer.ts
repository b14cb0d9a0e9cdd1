import { errorMessage } from "./errors";
import { log } from "./logger";
import { clampScore, normalizeText, round2 } from "./normalize";
import { hasTerm, matchedTerms, sumTermGroup, sumTermWeights, tierPoints } from "./rules";
import type { RoleClass, ScoringTables } from "./scoringTables";
import type { CompanyProfile, FounderProfile, FounderQuality, QualityBreakdown } from "./types";

type QualityTables = ScoringTables["quality"];

const ROLE_CLASS_ORDER: RoleClass[] = ["ceo", "cto", "product", "operations", "finance"];
const YEARS_PATTERN = /(\d+)\s*\+?\s*(?:years?|yrs?)(?![a-z])/g;

function largestYears(text: string): number {
  let max = 0;
  for (const m of text.matchAll(YEARS_PATTERN)) {
    const n = Number(m[1]);
    if (Number.isFinite(n) && n > max) max = n;
  }
  return max;
}

export function experienceScore(experience: string, t: QualityTables): number {
  const text = normalizeText(experience);
  if (!text) return 0;
  const e = t.experience;
  const score =
    sumTermGroup(text, e.prestigiousCompanies) +
    sumTermGroup(text, e.keywords) +
    tierPoints(largestYears(text), e.yearsTiers);
  return Math.min(e.cap, score);
}

export function educationScore(education: string, t: QualityTables): number {
  const text = normalizeText(education);
  if (!text) return 0;
  const ed = t.education;
  const score = sumTermGroup(text, ed.universities) + sumTermGroup(text, ed.advancedDegrees) + sumTermGroup(text, ed.fields);
  return Math.min(ed.cap, score);
}

export function honorsScore(founder: FounderProfile, t: QualityTables): number {
  const h = t.honors;
  let score = 0;
  for (const field of [founder.experience, founder.education, founder.honors]) {
    const text = normalizeText(field);
    if (text) score += sumTermWeights(text, h.points);
  }
  const identity = normalizeText(`${founder.name} ${founder.title}`);
  if (h.doctoralMarkers.some((m) => hasTerm(identity, m))) score += h.doctoralBonus;
  return Math.min(h.cap, score);
}

export function networkScore(founder: FounderProfile, t: QualityTables): number {
  const n = t.network;
  const score = tierPoints(founder.linkedinConnections, n.connectionTiers) + tierPoints(founder.endorsements, n.endorsementTiers);
  return Math.min(n.cap, score);
}

export function scoreFounder(founder: FounderProfile, t: QualityTables): FounderQuality {
  const experience = experienceScore(founder.experience, t);
  const education = educationScore(founder.education, t);
  const honors = honorsScore(founder, t);
  const network = networkScore(founder, t);
  return {
    name: founder.name,
    experience,
    education,
    honors,
    network,
    total: Math.min(100, experience + education + honors + network),
  };
}

export function companyScore(company: CompanyProfile, t: QualityTables, now: Date): number {
  const c = t.company;
  let score = tierPoints(company.description.trim().length, c.descriptionLengthTiers);

  const industry = normalizeText(company.industry);
  if (industry && c.industryKeywords.some((k) => hasTerm(industry, k))) score += c.industryBonus;

  const location = normalizeText(company.location);
  if (location && c.topLocations.some((l) => hasTerm(location, l))) score += c.locationBonus;

  if (company.foundedYear != null) {
    const age = now.getUTCFullYear() - company.foundedYear;
    if (age >= 0) {
      const tier = c.ageTiers.find((a) => age < a.maxExclusive);
      if (tier) score += tier.points;
    }
  }

  return Math.min(c.cap, score);
}

export function classifyRole(title: string, t: QualityTables): RoleClass | null {
  const text = normalizeText(title);
  if (!text) return null;
  for (const role of ROLE_CLASS_ORDER) {
    if (matchedTerms(text, t.team.roleClasses[role]).length) return role;
  }
  return null;
}

export function teamCompleteness(founders: FounderProfile[], t: QualityTables): number {
  const team = t.team;
  const roles = new Set<RoleClass>();
  let hasCofounder = false;
  for (const f of founders) {
    const role = classifyRole(f.title, t);
    if (role) roles.add(role);
    const title = normalizeText(f.title);
    if (team.cofounderMarkers.some((m) => hasTerm(title, m))) hasCofounder = true;
  }

  // core set: CEO, CTO, co-founder
  const coreHits = [roles.has("ceo"), roles.has("cto"), hasCofounder].filter(Boolean).length;

  const score =
    tierPoints(founders.length, team.founderCountTiers) +
    tierPoints(roles.size, team.diversityTiers) +
    tierPoints(coreHits, team.coreRoleTiers);
  return Math.min(team.cap, score);
}

function zeroBreakdown(): QualityBreakdown {
  return { qualityScore: 0, founderAverage: 0, companyScore: 0, teamCompleteness: 0, founders: [] };
}

/**
 * Intrinsic strength of a candidate, independent of any organization.
 * A company with no founders scores 0. Never throws.
 */
export function scoreQuality(company: CompanyProfile, tables: ScoringTables, now: Date = new Date()): QualityBreakdown {
  if (company.founders.length === 0) return zeroBreakdown();

  const t = tables.quality;
  try {
    const founders = company.founders.map((f) => scoreFounder(f, t));
    const founderAverage = founders.reduce((sum, f) => sum + f.total, 0) / founders.length;
    const companyPoints = companyScore(company, t, now);
    const team = teamCompleteness(company.founders, t);

    const qualityScore = clampScore(
      round2(founderAverage * t.weights.founders + companyPoints * t.weights.company + team * t.weights.team)
    );

    return {
      qualityScore,
      founderAverage: round2(founderAverage),
      companyScore: companyPoints,
      teamCompleteness: team,
      founders,
    };
  } catch (e) {
    log.error("Quality scoring failed", { company: company.name, message: errorMessage(e) });
    return zeroBreakdown();
  }
}
