import { consola } from "consola";
import type { AdaptestEventMap, EventBus } from "./event-bus";

/** Route bus events to the console. Returns a function that detaches the handlers. */
export function attachLogger(bus: EventBus): () => void {
  const onAny = (event: string, data: unknown) => consola.debug(`[event] ${event}`, data);

  const onRecorded = (data: AdaptestEventMap["session.response.recorded"]) => {
    consola.info(
      `[${data.session_id.slice(0, 8)}] #${data.n_items} ${data.item_id}: ${data.is_correct ? "CORRECT" : "WRONG"} | θ=${data.theta.toFixed(2)} | SE=${data.se.toFixed(2)} (${data.method})`,
    );
  };

  const onFallback = (data: AdaptestEventMap["session.estimator.fallback"]) => {
    consola.warn(
      `[${data.session_id.slice(0, 8)}] estimator fallback (${data.reason}), θ=${data.theta.toFixed(2)}`,
    );
  };

  const onCompleted = (data: AdaptestEventMap["session.completed"]) => {
    consola.success(
      `[${data.session_id.slice(0, 8)}] Completed after ${data.n_items} items: θ=${data.theta.toFixed(2)} SE=${data.se.toFixed(2)} (${data.reason})`,
    );
  };

  bus.onAny(onAny);
  bus.on("session.response.recorded", onRecorded);
  bus.on("session.estimator.fallback", onFallback);
  bus.on("session.completed", onCompleted);

  return () => {
    bus.offAny(onAny);
    bus.off("session.response.recorded", onRecorded);
    bus.off("session.estimator.fallback", onFallback);
    bus.off("session.completed", onCompleted);
  };
}


export { consola as logger };
