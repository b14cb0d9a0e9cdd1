import type { Clock } from "./clock";
import type { Encoder } from "./encoders";
import type { CompanyProfile, FounderProfile, OrganizationProfile, Vector } from "./types";

export function founder(overrides: Partial<FounderProfile> = {}): FounderProfile {
  return {
    name: "Jane Doe",
    title: "",
    experience: "",
    education: "",
    honors: "",
    linkedinConnections: 0,
    endorsements: 0,
    ...overrides,
  };
}

export function company(overrides: Partial<CompanyProfile> = {}): CompanyProfile {
  return {
    name: "Candidate Co",
    description: "",
    industry: "",
    location: "",
    founders: [],
    ...overrides,
  };
}

export function organization(overrides: Partial<OrganizationProfile> = {}): OrganizationProfile {
  return {
    name: "Test Ventures",
    thesis: "",
    preferredIndustries: [],
    preferredStages: [],
    preferredLocations: [],
    portfolio: [],
    ...overrides,
  };
}

export const FIXED_NOW = new Date("2026-06-01T00:00:00Z");

/** 614 characters once trimmed. */
export const ACME_DESCRIPTION = "Applied AI platform for logistics teams. ".repeat(15);

export function acme(): CompanyProfile {
  return company({
    name: "Acme AI",
    description: ACME_DESCRIPTION,
    industry: "AI/ML",
    location: "San Francisco, CA",
    foundedYear: FIXED_NOW.getUTCFullYear() - 2,
    founders: [
      founder({
        title: "CEO",
        experience: "10 years engineering leadership",
        education: "MBA Stanford",
      }),
    ],
  });
}

/** Manual clock: sleep() advances time instantly and records the requested wait. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public t = 0) {}

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += Math.max(0, ms);
  }
}

/** Same vector for every text; any two non-empty texts have cosine 1. */
export class ConstantEncoder implements Encoder {
  readonly name = "constant";
  calls = 0;

  async encode(_text: string): Promise<Vector> {
    this.calls += 1;
    return [1, 0, 0];
  }
}

export class FailingEncoder implements Encoder {
  readonly name = "failing";
  calls = 0;

  async encode(_text: string): Promise<Vector> {
    this.calls += 1;
    throw new Error("embedding service unavailable");
  }
}

/** Holds every encode() until release(); counts calls per text. */
export class GatedEncoder implements Encoder {
  readonly name = "gated";
  readonly calls: string[] = [];
  private waiting: Array<() => void> = [];

  async encode(text: string): Promise<Vector> {
    this.calls.push(text);
    await new Promise<void>((resolve) => this.waiting.push(resolve));
    return [text.length, 1];
  }

  release(): void {
    const pending = this.waiting;
    this.waiting = [];
    for (const resolve of pending) resolve();
  }
}
