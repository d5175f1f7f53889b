import type { Term, TermCounts, Token } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

/** Every ASCII punctuation character. */
export const DEFAULT_PUNCTUATION: ReadonlySet<string> = new Set("!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~");

// runs of anything but Unicode White_Space (U+FEFF is not whitespace, U+0085 is)
const WORD = /[^\t-\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/g;

/**
 * Whitespace tokenizer:
 * - splits on Unicode White_Space only
 * - lowercases, then drops every character of the punctuation set
 * - keeps tokens that normalize to "" (an all-punctuation word counts as the empty term)
 */
export class PunctuationTokenizer implements Tokenizer {
  private readonly punctuation: ReadonlySet<string>;

  constructor(punctuation: ReadonlySet<string> = DEFAULT_PUNCTUATION) {
    this.punctuation = punctuation;
  }

  *tokenize(text: string): Iterable<Token> {
    let position = 0;
    for (const m of text.matchAll(WORD)) {
      yield { term: this.normalize(m[0]), position };
      position++;
    }
  }

  normalize(word: string): Term {
    let out = "";
    for (const ch of word.toLowerCase()) {
      if (!this.punctuation.has(ch)) out += ch;
    }
    return out;
  }

  countTerms(text: string): TermCounts {
    const counts: TermCounts = new Map();
    for (const tok of this.tokenize(text)) {
      counts.set(tok.term, (counts.get(tok.term) ?? 0) + 1);
    }
    return counts;
  }
}
