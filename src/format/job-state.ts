/**
 * Job state record: what a notification says about a build.
 *
 * Owned by whoever collects build state; jobcast only serializes it.
 * Free-form keyed data (build parameters, artifact links) is carried in
 * Maps so the JSON encoder can tell data keys from field names.
 */

import { ValidationError } from "../errors.js";

export type Phase = "QUEUED" | "STARTED" | "COMPLETED" | "FINALIZED";

export const PHASES: readonly Phase[] = ["QUEUED", "STARTED", "COMPLETED", "FINALIZED"];

export interface ScmState {
  url?: string;
  branch?: string;
  commit?: string;
  changes?: string[];
  culprits?: string[];
}

export interface FailedTest {
  className: string;
  name: string;
  errorDetails?: string;
}

export interface TestSummary {
  total: number;
  failed: number;
  skipped: number;
  passed: number;
  failedTests?: FailedTest[];
}

export interface BuildState {
  number: number;
  phase: Phase;
  fullUrl?: string;
  queueId?: number;
  /** Epoch millis. */
  timestamp?: number;
  /** Millis. */
  duration?: number;
  /** Build result, e.g. SUCCESS, FAILURE, ABORTED. */
  status?: string;
  url?: string;
  displayName?: string;
  notes?: string;
  /** Tail of the build log. */
  log?: string;
  scm?: ScmState;
  /** Artifact name → { archive: url, ... } */
  artifacts?: Map<string, Map<string, string>>;
  parameters?: Map<string, string>;
  testSummary?: TestSummary;
}

export interface JobState {
  name: string;
  displayName?: string;
  url?: string;
  build: BuildState;
}

// ---------------------------------------------------------------------------
// Loading from untyped JSON (CLI input, fixtures)
// ---------------------------------------------------------------------------

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toRecord(v: unknown): Record<string, unknown> | null {
  return isRecord(v) ? v : null;
}

function optString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function optNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function stringList(v: unknown): string[] | undefined {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string") : undefined;
}

function stringMap(v: unknown): Map<string, string> | undefined {
  const rec = toRecord(v);
  if (!rec) return undefined;
  const out = new Map<string, string>();
  for (const [key, value] of Object.entries(rec)) {
    if (typeof value === "string") out.set(key, value);
    else if (typeof value === "number" || typeof value === "boolean") out.set(key, String(value));
  }
  return out;
}

function isPhase(v: unknown): v is Phase {
  return typeof v === "string" && (PHASES as readonly string[]).includes(v);
}

function scmFromJson(v: unknown): ScmState | undefined {
  const rec = toRecord(v);
  if (!rec) return undefined;
  return {
    url: optString(rec.url),
    branch: optString(rec.branch),
    commit: optString(rec.commit),
    changes: stringList(rec.changes),
    culprits: stringList(rec.culprits),
  };
}

function testSummaryFromJson(v: unknown): TestSummary | undefined {
  const rec = toRecord(v);
  if (!rec) return undefined;
  const failedTests = Array.isArray(rec.failedTests)
    ? rec.failedTests
        .map((t): FailedTest | null => {
          const obj = toRecord(t);
          if (!obj || typeof obj.className !== "string" || typeof obj.name !== "string") return null;
          return { className: obj.className, name: obj.name, errorDetails: optString(obj.errorDetails) };
        })
        .filter((t): t is FailedTest => t !== null)
    : undefined;
  return {
    total: optNumber(rec.total) ?? 0,
    failed: optNumber(rec.failed) ?? 0,
    skipped: optNumber(rec.skipped) ?? 0,
    passed: optNumber(rec.passed) ?? 0,
    failedTests,
  };
}

function artifactsFromJson(v: unknown): Map<string, Map<string, string>> | undefined {
  const rec = toRecord(v);
  if (!rec) return undefined;
  const out = new Map<string, Map<string, string>>();
  for (const [name, links] of Object.entries(rec)) {
    const map = stringMap(links);
    if (map) out.set(name, map);
  }
  return out;
}

/**
 * Build a JobState from parsed JSON written in identifier-style field names
 * (the shape of the JobState interface). `parameters` and `artifacts` are
 * objects in JSON and Maps in memory.
 */
export function jobStateFromJson(raw: unknown): JobState {
  const rec = toRecord(raw);
  if (!rec) {
    throw new ValidationError("Invalid job state: expected a JSON object");
  }
  if (typeof rec.name !== "string" || rec.name.trim().length === 0) {
    throw new ValidationError("Invalid job state: 'name' must be a non-empty string");
  }
  const buildRaw = toRecord(rec.build);
  if (!buildRaw) {
    throw new ValidationError("Invalid job state: 'build' must be an object");
  }
  const number = optNumber(buildRaw.number);
  if (number === undefined || !Number.isInteger(number)) {
    throw new ValidationError("Invalid job state: 'build.number' must be an integer");
  }
  if (!isPhase(buildRaw.phase)) {
    throw new ValidationError(`Invalid job state: 'build.phase' must be one of ${PHASES.join(", ")}`);
  }

  const build: BuildState = {
    number,
    phase: buildRaw.phase,
    fullUrl: optString(buildRaw.fullUrl),
    queueId: optNumber(buildRaw.queueId),
    timestamp: optNumber(buildRaw.timestamp),
    duration: optNumber(buildRaw.duration),
    status: optString(buildRaw.status),
    url: optString(buildRaw.url),
    displayName: optString(buildRaw.displayName),
    notes: optString(buildRaw.notes),
    log: optString(buildRaw.log),
    scm: scmFromJson(buildRaw.scm),
    artifacts: artifactsFromJson(buildRaw.artifacts),
    parameters: stringMap(buildRaw.parameters),
    testSummary: testSummaryFromJson(buildRaw.testSummary),
  };

  return {
    name: rec.name,
    displayName: optString(rec.displayName),
    url: optString(rec.url),
    build,
  };
}
