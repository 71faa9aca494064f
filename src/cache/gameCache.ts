/**
 * Game Cache
 *
 * Typed view of one game's artifacts in an ArtifactStore. Every slot holds
 * either a present value or an explicit "absent" marker for sources that
 * legitimately have no data. Values are validated against their schema on
 * the way out; an entry that fails is logged and treated as never written.
 */

import { z } from 'zod';
import { logger } from '../core/logger.js';
import {
  apiEventRecordSchema,
  apiRosterRecordSchema,
  canonicalEventSchema,
  diagnosticSchema,
  enrichedEventSchema,
  gameInfoSchema,
  htmlEventRecordSchema,
  htmlRosterRecordSchema,
  rawSourceSchema,
  rosterEntrySchema,
  shiftChangeSchema,
  shiftRecordSchema,
} from '../models/records.js';
import type { RawSource, SourceKind } from '../models/records.js';
import type { ArtifactStore } from './artifactStore.js';
import { KEYS } from './keys.js';

export interface Slot<T> {
  kind: string;
  schema: z.ZodType<T>;
}

function slot<T>(kind: string, schema: z.ZodType<T>): Slot<T> {
  return { kind, schema };
}

export const SLOTS = {
  gameInfo: slot('gameInfo', gameInfoSchema),
  apiEvents: slot('apiEvents', z.array(apiEventRecordSchema)),
  apiRosters: slot('apiRosters', z.array(apiRosterRecordSchema)),
  htmlEvents: slot('htmlEvents', z.array(htmlEventRecordSchema)),
  htmlRosters: slot('htmlRosters', z.array(htmlRosterRecordSchema)),
  shifts: slot('shifts', z.array(shiftRecordSchema)),
  rosters: slot('rosters', z.array(rosterEntrySchema)),
  changes: slot('changes', z.array(shiftChangeSchema)),
  canonicalEvents: slot('canonicalEvents', z.array(canonicalEventSchema)),
  enrichedEvents: slot('enrichedEvents', z.array(enrichedEventSchema)),
  diagnostics: slot('diagnostics', z.array(diagnosticSchema)),
  raw: (kind: SourceKind): Slot<RawSource> => slot(KEYS.raw(kind), rawSourceSchema),
  /** Diagnostics raised while a stage produced its artifact */
  stageDiagnostics: (stage: string) => slot(`diagnostics:${stage}`, z.array(diagnosticSchema)),
};

export type Envelope<T> = { state: 'present'; value: T } | { state: 'absent'; reason: string };

const envelopeSchema = z.discriminatedUnion('state', [
  z.object({ state: z.literal('present'), value: z.unknown() }),
  z.object({ state: z.literal('absent'), reason: z.string() }),
]);

export class GameCache {
  constructor(
    private readonly store: ArtifactStore,
    readonly gameId: string
  ) {}

  /**
   * Reads a slot; undefined when it was never written or fails validation
   */
  async read<T>(slot: Slot<T>): Promise<Envelope<T> | undefined> {
    const text = await this.store.get(this.gameId, slot.kind);
    if (text === undefined) return undefined;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      logger.warn({ gameId: this.gameId, kind: slot.kind, err }, 'cached artifact is not JSON, ignoring');
      return undefined;
    }
    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      logger.warn({ gameId: this.gameId, kind: slot.kind }, 'cached artifact has no envelope, ignoring');
      return undefined;
    }
    if (envelope.data.state === 'absent') return envelope.data;

    const value = slot.schema.safeParse(envelope.data.value);
    if (!value.success) {
      logger.warn({ gameId: this.gameId, kind: slot.kind, issues: value.error.issues.length }, 'cached artifact failed validation, ignoring');
      return undefined;
    }
    return { state: 'present', value: value.data };
  }

  /**
   * Present value of a slot, or undefined when missing or absent
   */
  async value<T>(slot: Slot<T>): Promise<T | undefined> {
    const envelope = await this.read(slot);
    return envelope?.state === 'present' ? envelope.value : undefined;
  }

  /**
   * Validates and stores a value, returning it exactly as a later read will
   *
   * @throws ZodError if the value does not satisfy the slot's schema
   */
  async write<T>(slot: Slot<T>, value: T): Promise<T> {
    const envelope: Envelope<T> = { state: 'present', value: slot.schema.parse(value) };
    await this.store.set(this.gameId, slot.kind, JSON.stringify(envelope));
    return envelope.value;
  }

  async writeAbsent<T>(slot: Slot<T>, reason: string): Promise<void> {
    const envelope: Envelope<T> = { state: 'absent', reason };
    await this.store.set(this.gameId, slot.kind, JSON.stringify(envelope));
  }

  /**
   * Returns the cached slot, or computes, stores and returns it
   */
  async getOrCompute<T>(slot: Slot<T>, compute: () => Promise<T> | T): Promise<T> {
    const cached = await this.read(slot);
    if (cached?.state === 'present') return cached.value;
    return this.write(slot, await compute());
  }

  kinds(): Promise<string[]> {
    return this.store.kinds(this.gameId);
  }

  invalidate(kinds?: readonly string[]): Promise<void> {
    return this.store.invalidate(this.gameId, kinds);
  }
}
