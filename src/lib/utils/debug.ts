/**
 * Debug logging utility for the answer pipeline.
 * Only logs when DEBUG_RAG=true.
 *
 * Usage:
 *   import { debug } from "@/lib/utils/debug";
 *   debug.fuse("Fused list", { size: 12 });
 */

type LogData = unknown;

function isDebug(): boolean {
  return process.env.DEBUG_RAG === "true";
}

function createLogger(prefix: string) {
  return {
    log: (...args: LogData[]) => {
      if (isDebug()) console.log(`[${prefix}]`, ...args);
    },
    warn: (...args: LogData[]) => {
      if (isDebug()) console.warn(`[${prefix}]`, ...args);
    },
  };
}

/** Namespaced debug loggers */
export const debug = {
  /** Check if debug mode is enabled */
  get enabled(): boolean {
    return isDebug();
  },

  /** Variant generation */
  expand: createLogger("Expand"),

  /** Search tier calls */
  search: createLogger("Search"),

  /** Rank fusion */
  fuse: createLogger("Fuse"),

  /** Reranker prompt and parsed order */
  rerank: createLogger("Rerank"),

  /** Context budgeting */
  context: createLogger("Context"),

  /** Model attempts */
  generate: createLogger("Generate"),

  /** Citation and source attribution */
  citation: createLogger("Citation"),

  /** Usage tracker writes */
  usage: createLogger("Usage"),

  /** Generic debug log (use sparingly) */
  log: (...args: LogData[]) => {
    if (isDebug()) console.log("[DEBUG]", ...args);
  },
};

export default debug;
