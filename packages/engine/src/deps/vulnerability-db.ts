/**
 * Vulnerability database clients.
 *
 * The auditor only sees the VulnerabilityDatabase interface. The npm client
 * queries the registry's bulk advisory endpoint via native fetch; the memory
 * client serves fixed advisories to tests and offline runs.
 */

import { z } from "zod";

export const AdvisorySeveritySchema = z.enum(["critical", "high", "moderate", "low", "info"]);

export type AdvisorySeverity = z.infer<typeof AdvisorySeveritySchema>;

export interface KnownVulnerability {
  id: string;
  title: string;
  severity: AdvisorySeverity;
  url?: string;
  vulnerableVersions?: string;
}

export interface VulnerabilityDatabase {
  readonly name: string;
  query(packageName: string, version: string, signal: AbortSignal): Promise<KnownVulnerability[]>;
}

const DEFAULT_REGISTRY = "https://registry.npmjs.org";

const bulkResponseSchema = z.record(
  z.array(
    z.object({
      id: z.union([z.number(), z.string()]),
      title: z.string(),
      severity: AdvisorySeveritySchema.catch("info"),
      url: z.string().optional(),
      vulnerable_versions: z.string().optional(),
    }),
  ),
);

export class NpmAdvisoryDatabase implements VulnerabilityDatabase {
  readonly name = "npm";
  private baseUrl: string;

  constructor(baseUrl?: string) {
    this.baseUrl = (baseUrl ?? DEFAULT_REGISTRY).replace(/\/$/, "");
  }

  async query(packageName: string, version: string, signal: AbortSignal): Promise<KnownVulnerability[]> {
    const response = await fetch(`${this.baseUrl}/-/npm/v1/security/advisories/bulk`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ [packageName]: [version] }),
      signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`npm advisory API error ${response.status}: ${body.slice(0, 200)}`);
    }

    const parsed = bulkResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`npm advisory API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    return (parsed.data[packageName] ?? []).map((advisory) => ({
      id: String(advisory.id),
      title: advisory.title,
      severity: advisory.severity,
      url: advisory.url,
      vulnerableVersions: advisory.vulnerable_versions,
    }));
  }
}

/** Advisories keyed by package name. Versions are not compared. */
export class MemoryVulnerabilityDatabase implements VulnerabilityDatabase {
  readonly name = "memory";
  readonly queries: Array<{ name: string; version: string }> = [];

  constructor(private readonly advisories: Record<string, KnownVulnerability[]> = {}) {}

  async query(packageName: string, version: string): Promise<KnownVulnerability[]> {
    this.queries.push({ name: packageName, version });
    return this.advisories[packageName] ?? [];
  }
}
