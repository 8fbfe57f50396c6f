/**
 * TextSanitizer: turns the API's HTML-entity-encoded text into plain text.
 *
 * Question text, every answer option and the correct answer all go
 * through `sanitize`, so a selected option can be compared to the
 * correct answer with plain string equality.
 */

import { decode } from "html-entities";

/**
 * Decode HTML entities until the text stops changing, so that
 * `sanitize(sanitize(x)) === sanitize(x)` also holds for doubly-encoded
 * input such as `&amp;quot;`. Returns the input unchanged if decoding fails.
 *
 * Text that is meant to show an entity is decoded too: `&amp;lt;` becomes
 * `<`, not `&lt;`, and a legacy entity without its semicolon (`&copy`)
 * left behind by an earlier pass is decoded on the next one.
 */
export function sanitize(raw: string): string {
  try {
    let current = raw;
    let next = decode(current, { level: "html5" });
    // Every decoded entity is shorter than its source, so this terminates.
    while (next !== current) {
      current = next;
      next = decode(current, { level: "html5" });
    }
    return current;
  } catch (err) {
    console.warn("[TextSanitizer] Decode failed, keeping raw text:", err);
    return raw;
  }
}
