import path from "node:path";
import { readFile, stat } from "node:fs/promises";
import fg from "fast-glob";

import type { DocumentInput } from "../core/types.js";
import { SearchError } from "../errors.js";

/**
 * Reads every regular file under `dir`, recursively, as one document. Symbolic links,
 * to files or directories, are skipped.
 *
 * Files are decoded as UTF-8 with invalid sequences replaced by U+FFFD.
 * The document id is `path.join(dir, relative)`; ids come back sorted.
 */
export async function loadCorpus(dir: string): Promise<DocumentInput[]> {
  let entries: string[];
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      throw new SearchError({ code: "CORPUS_UNREADABLE", detail: `${dir} is not a directory` });
    }
    entries = await fg("**/*", {
      cwd: dir,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: false,
    });
  } catch (e) {
    if (e instanceof SearchError) throw e;
    throw new SearchError({ code: "CORPUS_UNREADABLE", detail: `cannot list ${dir}`, cause: e });
  }
  entries.sort();

  const docs: DocumentInput[] = [];
  for (const rel of entries) {
    const id = path.join(dir, rel);
    docs.push({ id, text: await readDocument(id) });
  }
  return docs;
}

export async function readDocument(file: string): Promise<string> {
  try {
    const buf = await readFile(file);
    return buf.toString("utf8");
  } catch (e) {
    throw new SearchError({ code: "CORPUS_UNREADABLE", detail: `cannot read ${file}`, cause: e });
  }
}
