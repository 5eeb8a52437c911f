import type { CandidateRef, Collector, SourceEntity } from './types.js';
import { entityKey } from './types.js';
import { canonicalUrl } from './urls.js';
import type { PaginationMode } from '../shared/config.js';
import { CollectionError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_STAGNATION_LIMIT = 5;
export const DEFAULT_ROUND_CAP = 200;

export type ControllerState =
  | 'COLLECTING'
  | 'STOPPING_TARGET_MET'
  | 'STOPPING_STAGNANT'
  | 'STOPPING_CAPPED'
  | 'STOPPING_CANCELLED';

export interface PaginationOptions {
  targetNewCount: number;
  mode: PaginationMode;
  stagnationLimit?: number;
  roundCap?: number;
  signal?: AbortSignal;
  /** Called after each round with the refs admitted in it. */
  onRound?: (admitted: CandidateRef[], round: number) => Promise<void>;
}

export interface PaginationResult {
  state: ControllerState;
  rounds: number;
  admitted: CandidateRef[];
  collectionErrors: number;
}

export interface StopInput {
  mode: PaginationMode;
  admittedTotal: number;
  targetNewCount: number;
  stagnantRounds: number;
  stagnationLimit: number;
  round: number;
  roundCap: number;
}

/**
 * Stop rule checked after every round. Target, then stagnation, then cap.
 */
export function decideStop(input: StopInput): ControllerState {
  if (input.mode === 'bounded' && input.admittedTotal >= input.targetNewCount) {
    return 'STOPPING_TARGET_MET';
  }
  if (input.stagnantRounds >= input.stagnationLimit) {
    return 'STOPPING_STAGNANT';
  }
  if (input.round >= input.roundCap) {
    return 'STOPPING_CAPPED';
  }
  return 'COLLECTING';
}

/**
 * Drives "request next page, observe delta, decide to continue" against a
 * Collector. Each controller instance runs once.
 */
export class PaginationController {
  private currentState: ControllerState = 'COLLECTING';
  private readonly seen = new Set<string>();
  private started = false;

  constructor(
    private readonly collector: Collector,
    private readonly entity: SourceEntity,
    private readonly known: ReadonlySet<string>,
    private readonly options: PaginationOptions,
  ) {}

  get state(): ControllerState {
    return this.currentState;
  }

  async run(): Promise<PaginationResult> {
    if (this.started) {
      throw new Error('PaginationController.run() may only be called once');
    }
    this.started = true;

    const stagnationLimit = this.options.stagnationLimit ?? DEFAULT_STAGNATION_LIMIT;
    const roundCap = this.options.roundCap ?? DEFAULT_ROUND_CAP;
    const key = entityKey(this.entity);
    const admitted: CandidateRef[] = [];
    let stagnantRounds = 0;
    let collectionErrors = 0;
    let round = 0;

    while (this.currentState === 'COLLECTING') {
      if (this.options.signal?.aborted) {
        this.currentState = 'STOPPING_CANCELLED';
        break;
      }

      round++;
      const roundAdmitted: CandidateRef[] = [];

      try {
        const batch = await this.collector.nextBatch(this.entity, {
          round,
          admittedSoFar: admitted.length,
          signal: this.options.signal,
        });

        for (const link of batch) {
          if (!link.url) continue;
          const id = canonicalUrl(link.url);
          if (this.known.has(id) || this.seen.has(id)) continue;

          this.seen.add(id);
          const ref: CandidateRef = { id, url: link.url, round };
          admitted.push(ref);
          roundAdmitted.push(ref);
        }
      } catch (err) {
        collectionErrors++;
        const error =
          err instanceof CollectionError
            ? err
            : new CollectionError(`Batch request failed: ${errorMessage(err)}`, { round });
        logger.warn({ entity: key, round, error: error.message }, 'Collection failed, counting as empty round');
      }

      if (roundAdmitted.length > 0) {
        stagnantRounds = 0;
      } else {
        stagnantRounds++;
      }

      logger.debug(
        { entity: key, round, delta: roundAdmitted.length, total: admitted.length, stagnantRounds },
        'Paging round complete',
      );

      if (roundAdmitted.length > 0 && this.options.onRound) {
        await this.options.onRound(roundAdmitted, round);
      }

      this.currentState = decideStop({
        mode: this.options.mode,
        admittedTotal: admitted.length,
        targetNewCount: this.options.targetNewCount,
        stagnantRounds,
        stagnationLimit,
        round,
        roundCap,
      });
    }

    logger.info(
      { entity: key, state: this.currentState, rounds: round, admitted: admitted.length },
      'Paging finished',
    );

    return { state: this.currentState, rounds: round, admitted, collectionErrors };
  }
}
