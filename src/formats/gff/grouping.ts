/**
 * Seed-based grouping of annotation lines into features
 *
 * The engine reads one record past the end of each feature: the first
 * line that does not belong ends the current feature and seeds the next.
 *
 * @module gff/grouping
 */

import { ParseError } from "../../errors";
import { toBedCoordinates } from "./coordinates";
import { GffFeature } from "./feature";
import { buildGffInterval } from "./interval";
import { recordSkippedLine } from "./summary";
import type { RecordTokenizer } from "./tokenizer";
import type {
  GffColumns,
  GffComment,
  GffHeader,
  GffInterval,
  GffRecord,
  ParseSummary,
  StrandPolicy,
} from "./types";

/**
 * Fixed inputs of one grouping run
 */
export interface GroupingSettings {
  readonly columns: GffColumns;
  readonly strandPolicy: StrandPolicy;
  readonly convertToBedCoord: boolean;
  readonly onWarning: (warning: string, lineNumber?: number) => void;
  /** Throws to stop the run; called before every pull */
  readonly checkAborted: () => void;
}

type GroupingPhase =
  | { readonly name: "seeking" }
  | { readonly name: "accumulating"; readonly seed: GffInterval }
  | { readonly name: "done" };

/**
 * Cursor state of one stream, owned by a single consumer
 */
export interface GroupingState {
  phase: GroupingPhase;
  /** Bytes already consumed on behalf of the next feature */
  pendingSize: number;
  readonly summary: ParseSummary;
}

type PulledRecord =
  | { readonly kind: "interval"; readonly interval: GffInterval; readonly size: number }
  | { readonly kind: "passthrough"; readonly record: GffHeader | GffComment }
  | { readonly kind: "skipped"; readonly size: number }
  | { readonly kind: "end"; readonly size: number };

interface GroupIdentity {
  /** GFF */
  readonly group: string | undefined;
  /** GFF3, matched against ID and Parent */
  readonly id: string | undefined;
  /** GTF */
  readonly transcriptId: string | undefined;
}

const DONE: GroupingPhase = { name: "done" };

export function createGroupingState(summary: ParseSummary): GroupingState {
  return { phase: { name: "seeking" }, pendingSize: 0, summary };
}

/**
 * Emit headers, comments and features from a tokenizer, lazily
 *
 * Malformed lines are counted in `state.summary` and skipped. A
 * {@link ChromMismatchError} from feature assembly ends the iteration.
 */
export async function* groupRecords(
  tokenizer: RecordTokenizer,
  state: GroupingState,
  settings: GroupingSettings
): AsyncGenerator<GffRecord, void, undefined> {
  try {
    while (state.phase.name !== "done") {
      const phase = state.phase;
      if (phase.name === "accumulating") {
        yield await accumulateFeature(phase.seed, tokenizer, state, settings);
        continue;
      }

      const pulled = await pullRecord(tokenizer, state, settings);
      switch (pulled.kind) {
        case "end":
          state.phase = DONE;
          break;
        case "skipped":
          state.pendingSize += pulled.size;
          break;
        case "passthrough":
          yield pulled.record;
          break;
        case "interval":
          state.pendingSize += pulled.size;
          state.phase = { name: "accumulating", seed: pulled.interval };
          break;
      }
    }
  } finally {
    await tokenizer.close();
  }
}

async function accumulateFeature(
  seed: GffInterval,
  tokenizer: RecordTokenizer,
  state: GroupingState,
  settings: GroupingSettings
): Promise<GffFeature> {
  const identity = groupIdentity(seed);
  const intervals: [GffInterval, ...GffInterval[]] = [seed];
  let rawSize = state.pendingSize;

  for (;;) {
    const pulled = await pullRecord(tokenizer, state, settings);

    if (pulled.kind === "end") {
      rawSize += pulled.size;
      state.phase = DONE;
      state.pendingSize = 0;
      break;
    }
    if (pulled.kind === "passthrough") {
      // Comments never join or break a feature
      rawSize += pulled.record.rawSize;
      continue;
    }
    if (pulled.kind === "skipped") {
      rawSize += pulled.size;
      continue;
    }

    if (!belongsToGroup(identity, pulled.interval)) {
      state.phase = { name: "accumulating", seed: pulled.interval };
      state.pendingSize = pulled.size;
      break;
    }
    rawSize += pulled.size;
    intervals.push(pulled.interval);
  }

  const feature = GffFeature.assemble(intervals, rawSize);
  return settings.convertToBedCoord ? toBedCoordinates(feature) : feature;
}

async function pullRecord(
  tokenizer: RecordTokenizer,
  state: GroupingState,
  settings: GroupingSettings
): Promise<PulledRecord> {
  settings.checkAborted();

  try {
    const raw = await tokenizer.next();
    switch (raw.kind) {
      case "end":
        return { kind: "end", size: tokenizer.consumedSize };
      case "header":
      case "comment":
        return { kind: "passthrough", record: raw };
      case "fields":
        return {
          kind: "interval",
          interval: buildGffInterval(
            raw.fields,
            settings.columns,
            settings.strandPolicy,
            tokenizer.lineNumber
          ),
          size: tokenizer.consumedSize,
        };
    }
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    recordSkippedLine(state.summary, {
      lineNumber: tokenizer.lineNumber,
      rawText: tokenizer.rawText,
      message: error.message,
    });
    settings.onWarning(error.message, tokenizer.lineNumber);
    return { kind: "skipped", size: tokenizer.consumedSize };
  }
}

function groupIdentity(seed: GffInterval): GroupIdentity {
  return {
    group: seed.attributes.get("group"),
    id: seed.attributes.get("ID"),
    transcriptId: seed.attributes.get("transcript_id"),
  };
}

function belongsToGroup(identity: GroupIdentity, interval: GffInterval): boolean {
  const { attributes } = interval;
  return (
    sameKey(identity.group, attributes.get("group")) ||
    sameKey(identity.id, attributes.get("ID")) ||
    sameKey(identity.id, attributes.get("Parent")) ||
    sameKey(identity.transcriptId, attributes.get("transcript_id"))
  );
}

function sameKey(seedValue: string | undefined, value: string | undefined): boolean {
  return seedValue !== undefined && seedValue !== "" && seedValue === value;
}
