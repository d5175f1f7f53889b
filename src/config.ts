import { parseArgs } from "node:util";

import type { FieldError } from "./errors.js";
import type { ScoreCollisionPolicy } from "./core/impl/index.js";
import { asString, oneOf, pushErr } from "./validation.js";

const COLLISION_POLICIES = ["replace", "retain"] as const satisfies readonly ScoreCollisionPolicy[];

export const DEFAULT_CORPUS_DIR = "corpus";

export interface Config {
  query: string;
  corpusDir: string;
  onScoreCollision: ScoreCollisionPolicy;
  /** timing lines on stderr */
  debug: boolean;
}

export type ConfigResult =
  | { kind: "ok"; config: Config }
  /** not exactly one positional query */
  | { kind: "usage" }
  | { kind: "invalid"; errors: FieldError[] };

/**
 * Reads `[--corpus <dir>] <query>` plus environment. The query is the last argument,
 * even when it starts with "-".
 * - CORPUS_DIR: used when --corpus is absent
 * - ON_SCORE_COLLISION: replace | retain
 * - SEARCH_DEBUG=1
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): ConfigResult {
  // the last argument is always the query, whatever it looks like
  const query = argv[argv.length - 1];
  if (query === undefined) return { kind: "usage" };

  let parsed: ReturnType<typeof parseArgv>;
  try {
    parsed = parseArgv(argv.slice(0, -1));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { kind: "invalid", errors: [{ path: "argv", message }] };
  }
  if (parsed.positionals.length) return { kind: "usage" };

  const errors: FieldError[] = [];

  const corpusDir = asString(parsed.values.corpus) ?? asString(env.CORPUS_DIR) ?? DEFAULT_CORPUS_DIR;

  const collision = asString(env.ON_SCORE_COLLISION) ?? "replace";
  let onScoreCollision: ScoreCollisionPolicy = "replace";
  if (oneOf(collision, COLLISION_POLICIES)) {
    onScoreCollision = collision;
  } else {
    pushErr(errors, "env.ON_SCORE_COLLISION", `must be one of: ${COLLISION_POLICIES.join(", ")}`);
  }

  if (errors.length) return { kind: "invalid", errors };

  return {
    kind: "ok",
    config: { query, corpusDir, onScoreCollision, debug: env.SEARCH_DEBUG === "1" },
  };
}

function parseArgv(argv: string[]) {
  return parseArgs({
    args: argv,
    options: { corpus: { type: "string", short: "c" } },
    allowPositionals: true,
    strict: true,
  });
}
