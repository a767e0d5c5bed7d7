import type { IngestionState } from "@profile-rag/types";
import { errorMessage } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";

const TRANSITIONS: Record<IngestionState, readonly IngestionState[]> = {
  INIT: ["LOADING", "FAILED"],
  LOADING: ["CHUNKING", "DONE", "FAILED"],
  CHUNKING: ["EMBEDDING", "DONE", "FAILED"],
  EMBEDDING: ["STORING", "FAILED"],
  STORING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: [],
};

export type StateChangeListener = (next: IngestionState, previous: IngestionState) => void;

/** Tracks one run's position in the ingestion lifecycle. */
export class IngestionStateMachine {
  private current: IngestionState = "INIT";
  private readonly history: IngestionState[] = ["INIT"];

  constructor(
    private readonly logger: Logger,
    private readonly onChange?: StateChangeListener,
  ) {}

  get state(): IngestionState {
    return this.current;
  }

  get visited(): readonly IngestionState[] {
    return this.history;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(next: IngestionState): void {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Illegal ingestion transition ${previous} -> ${next}`);
    }

    this.current = next;
    this.history.push(next);
    this.logger.info({ from: previous, to: next }, `Ingestion ${previous} -> ${next}`);
    if (!this.onChange) return;
    // listeners observe the run, they cannot change its outcome
    try {
      this.onChange(next, previous);
    } catch (err) {
      this.logger.warn({ state: next, err: errorMessage(err) }, "State change listener failed");
    }
  }
}
