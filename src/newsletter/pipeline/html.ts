/**
 * HTML tokenizer helpers shared by the attribute-rewriting stages.
 *
 * Rewrites go through a parsed document rather than regular expressions, so
 * a `src=` inside text, a comment or another attribute is never touched.
 */

import render from "dom-serializer";
import type { Document, Element } from "domhandler";
import { findAll, textContent } from "domutils";
import { parseDocument } from "htmlparser2";

export function parseHtml(html: string): Document {
  return parseDocument(html);
}

export function renderHtml(doc: Document): string {
  return render(doc, { encodeEntities: "utf8" });
}

/** Elements carrying `attribute`, in document order. */
export function elementsWithAttribute(doc: Document, attribute: string): Element[] {
  return findAll((el) => attribute in el.attribs, doc.children);
}

/** True when the markup renders any non-whitespace text or an image. */
export function hasVisibleContent(html: string): boolean {
  const doc = parseHtml(html);
  if (findAll((el) => el.name === "img", doc.children).length > 0) return true;
  return textContent(doc).trim().length > 0;
}
