// Basic domain types

export interface FounderProfile {
  name: string;
  title: string;
  experience: string;   // free-text biography
  education: string;
  honors: string;
  linkedinConnections: number;
  endorsements: number;
}

export interface CompanyProfile {
  name: string;
  description: string;
  industry: string;
  location: string;
  foundedYear?: number;
  fundingStage?: string; // explicit stage wins over inference from the description
  founders: FounderProfile[];
}

export interface PortfolioHolding {
  name: string;
  description?: string;
  industry?: string;
}

export interface OrganizationProfile {
  name: string;
  thesis: string;
  preferredIndustries: string[];
  preferredStages: string[];
  preferredLocations: string[];
  portfolio: PortfolioHolding[];
}

export type Vector = number[];

export interface FounderQuality {
  name: string;
  experience: number;
  education: number;
  honors: number;
  network: number;
  total: number;
}

export interface QualityBreakdown {
  qualityScore: number;
  founderAverage: number;
  companyScore: number;
  teamCompleteness: number;
  founders: FounderQuality[];
}

export interface FitBreakdown {
  fitScore: number;
  textSimilarity: number;
  industryMatch: number;
  stageMatch: number;
  locationMatch: number;
  networkProximity: number;
  inferredStage: string | null;
  notes: string[];
}

export type ConflictType = "business_model" | "name_similarity" | "industry_overlap";
export type ConflictSeverity = "none" | "medium" | "high";

export interface HoldingConflict {
  holding: string;
  score: number;
  types: ConflictType[];
}

export interface ConflictAnalysis {
  conflictScore: number;
  portfolioFitScore: number;
  conflictingNames: string[];
  conflicts: HoldingConflict[];
  severity: ConflictSeverity;
  notes: string[];
}

export type Recommendation = "Strong Match" | "Good Match" | "Moderate Match" | "Weak Match";

export interface ScoreBreakdown {
  companyName: string;
  qualityScore: number;
  fitScore: number;
  portfolioFitScore: number;
  overallScore: number;
  recommendation: Recommendation;
  pros: string[];
  cons: string[];
  notes: string[];
  failed: boolean;
  quality?: QualityBreakdown;
  fit?: FitBreakdown;
  conflict?: ConflictAnalysis;
}

export interface BatchSummary {
  total: number;
  scored: number;
  failed: number;
  cancelled: boolean;
  averageQuality: number;
  averageFit: number;
  averagePortfolioFit: number;
  averageOverall: number;
  recommendations: Record<Recommendation, number>;
}

export interface BatchReport {
  organization: string;
  results: ScoreBreakdown[];
  summary: BatchSummary;
}
