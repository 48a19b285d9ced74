import type {
  CompletionReason,
  EstimationMethod,
  FallbackReason,
  SessionReport,
} from "@adaptest/lib/types";

// Typed event map
export interface AdaptestEventMap {
  "session.started": {
    session_id: string;
    learner_id: string;
    topic: string | null;
    pool_size: number;
  };
  "session.resumed": { session_id: string; revision: number };
  "session.item.selected": {
    session_id: string;
    item_id: string;
    theta: number;
    information: number;
  };
  "session.response.recorded": {
    session_id: string;
    item_id: string;
    is_correct: boolean;
    theta: number;
    se: number;
    method: EstimationMethod;
    n_items: number;
  };
  "session.estimator.fallback": {
    session_id: string;
    reason: FallbackReason;
    theta: number;
  };
  "session.completed": {
    session_id: string;
    reason: CompletionReason;
    theta: number;
    se: number;
    n_items: number;
  };
  "session.saved": { session_id: string; revision: number };
  "report.generated": { report: SessionReport; path?: string };
}

type EventHandler<T> = (data: T) => void;
type AnyHandler = (event: string, data: unknown) => void;

export class EventBus {
  private handlers = new Map<string, Set<EventHandler<unknown>>>();
  private anyHandlers = new Set<AnyHandler>();

  on<K extends keyof AdaptestEventMap>(
    event: K,
    handler: EventHandler<AdaptestEventMap[K]>,
  ): void {
    if (!this.handlers.has(event)) {
      this.handlers.set(event, new Set());
    }
    this.handlers.get(event)?.add(handler as EventHandler<unknown>);
  }

  off<K extends keyof AdaptestEventMap>(
    event: K,
    handler: EventHandler<AdaptestEventMap[K]>,
  ): void {
    const set = this.handlers.get(event);
    if (set) {
      set.delete(handler as EventHandler<unknown>);
    }
  }

  once<K extends keyof AdaptestEventMap>(
    event: K,
    handler: EventHandler<AdaptestEventMap[K]>,
  ): void {
    const wrapper: EventHandler<AdaptestEventMap[K]> = (data) => {
      handler(data);
      this.off(event, wrapper);
    };
    this.on(event, wrapper);
  }

  emit<K extends keyof AdaptestEventMap>(event: K, data: AdaptestEventMap[K]): void {
    const set = this.handlers.get(event);
    if (set) {
      for (const handler of [...set]) {
        handler(data);
      }
    }
    for (const handler of this.anyHandlers) {
      handler(event, data);
    }
  }

  onAny(handler: AnyHandler): void {
    this.anyHandlers.add(handler);
  }

  offAny(handler: AnyHandler): void {
    this.anyHandlers.delete(handler);
  }

  removeAll(event?: keyof AdaptestEventMap): void {
    if (event) {
      this.handlers.delete(event);
    } else {
      this.handlers.clear();
      this.anyHandlers.clear();
    }
  }

  listenerCount(event: keyof AdaptestEventMap): number {
    return this.handlers.get(event)?.size ?? 0;
  }
}
