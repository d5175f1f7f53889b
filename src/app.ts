import { loadConfig } from "./config.js";
import { loadCorpus } from "./corpus/loader.js";
import { createInMemoryEngine } from "./engine.js";
import { isSearchError } from "./errors.js";
import { formatOutcome } from "./format.js";

export type Output = Pick<Console, "log" | "error">;

export const USAGE = "Please use a single argument";

/** Runs one query against a freshly built index. Resolves to the process exit code. */
export async function run(argv: string[], env: NodeJS.ProcessEnv, out: Output): Promise<number> {
  const cfg = loadConfig(argv, env);
  if (cfg.kind === "usage") {
    out.log(USAGE);
    return 0;
  }
  if (cfg.kind === "invalid") {
    for (const e of cfg.errors) out.error(`${e.path}: ${e.message}`);
    return 2;
  }

  const { query, corpusDir, onScoreCollision, debug } = cfg.config;
  out.log(`Searching for ${query}`);

  try {
    const started = Date.now();
    const docs = await loadCorpus(corpusDir);
    const loadedAt = Date.now();

    const engine = createInMemoryEngine({ onScoreCollision });
    const stats = engine.indexCorpus(docs);
    const indexedAt = Date.now();

    const outcome = engine.search(query);
    if (debug) {
      out.error(`loaded ${docs.length} documents in ${loadedAt - started}ms`);
      out.error(`indexed ${stats.termCount} terms in ${indexedAt - loadedAt}ms`);
      out.error(`searched in ${Date.now() - indexedAt}ms`);
    }

    for (const line of formatOutcome(outcome)) out.log(line);
    return 0;
  } catch (e) {
    if (isSearchError(e)) {
      out.error(e.message);
      return 1;
    }
    throw e;
  }
}
