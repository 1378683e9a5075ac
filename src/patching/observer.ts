// src/patching/observer.ts
// Patch observers: the pipeline reports checkpoints here instead of logging directly.

import type { Logger } from "pino";
import type { PatchEvent, PatchObserver } from "./types";

/** Drops every event. Default when the caller passes no observer. */
export const silentObserver: PatchObserver = {
  notify: () => undefined,
};

/** Fan one event out to several observers, in order. */
export function combineObservers(...observers: PatchObserver[]): PatchObserver {
  return {
    notify(event: PatchEvent) {
      for (const o of observers) o.notify(event);
    },
  };
}

/** Collects events in memory; handy for callers that return a trace. */
export class RecordingObserver implements PatchObserver {
  readonly events: PatchEvent[] = [];

  notify(event: PatchEvent): void {
    this.events.push(event);
  }
}

/**
 * Structured logging of patch checkpoints.
 * Low-confidence fuzzy hits and collisions are logged at warn.
 */
export function createLoggingObserver(log: Logger): PatchObserver {
  return {
    notify(event: PatchEvent) {
      switch (event.type) {
        case "exact_match":
        case "applied":
        case "noop":
        case "duplicate":
        case "expanded":
        case "subsumed":
          log.debug(event, `patch ${event.type}`);
          break;
        case "fuzzy_match":
          if (event.tier === "fuzzy_low") {
            log.warn(event, "low-confidence fuzzy match, applying anyway");
          } else {
            log.info(event, "fuzzy match");
          }
          break;
        case "collision_guard":
          log.warn(event, "collision guard triggered, edit skipped");
          break;
        case "not_found":
          log.warn(event, "anchor not found");
          break;
        case "expansion_failed":
          log.info(event, "heading expansion failed, using anchor as-is");
          break;
        case "swept":
          if (event.removed > 0) log.info(event, "duplicate paragraphs removed");
          break;
      }
    },
  };
}
