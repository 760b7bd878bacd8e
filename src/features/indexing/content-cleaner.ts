/**
 * HTML → plain text for index records.
 */
import { decodeHTML } from "entities";

const BLOCK_BREAK = /<\/(?:p|div|h[1-6]|li|ul|ol|dl|dt|dd|blockquote|section|article|header|footer|aside|table|tr|figure|figcaption)\s*>|<br\s*\/?>|<hr\s*\/?>/gi;

/**
 * Clean raw HTML content:
 *
 * - `&nbsp;` / `&#160;` become plain spaces
 * - `<script>`, `<style>`, `<code>` and `<pre>` blocks, comments and CDATA are dropped
 * - block closers and `<br>` become line breaks, other tags are removed
 * - entities are decoded
 * - runs of spaces collapse to one space, runs of line breaks to one `\n`
 */
export function cleanContent(raw: string): string {
  const text = raw
    .replace(/&nbsp;|&#160;|&#xa0;/gi, " ")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<!\[CDATA\[[\s\S]*?\]\]>/g, "")
    .replace(/<(script|style|code|pre)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, "")
    .replace(BLOCK_BREAK, "\n")
    .replace(/<[^>]*>/g, "");

  return decodeHTML(text)
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ ?\n[\n ]*/g, "\n")
    .trim();
}
