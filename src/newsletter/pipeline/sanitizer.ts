/**
 * Allow-list HTML sanitizer, the last stage before a body is stored.
 */

import sanitizeHtml, { type IOptions } from "sanitize-html";
import { type StagedHtml, staged } from "./types.js";

const ALLOWED_TAGS = [
  "p", "br", "hr", "div", "span", "blockquote", "pre", "code",
  "h1", "h2", "h3", "h4", "h5", "h6",
  "strong", "b", "em", "i", "u", "s", "small", "sub", "sup", "mark",
  "ul", "ol", "li", "dl", "dt", "dd",
  "a", "img", "figure", "figcaption",
  "table", "thead", "tbody", "tfoot", "tr", "th", "td", "caption",
  "colgroup", "col", "center", "font",
];

/** Dropped together with everything inside them. */
const DROPPED_WITH_CONTENT = [
  "script", "style", "iframe", "object", "embed",
  "noscript", "title", "textarea", "option", "template",
];

const TABLE_ATTRS = ["width", "height", "border", "cellpadding", "cellspacing", "bgcolor"];
const CELL_ATTRS = ["width", "height", "colspan", "rowspan", "valign", "bgcolor"];

// Values may not contain `:`, `/` or `\`, and may not call url(), expression() etc.
const SAFE_VALUE =
  /^(?!.*\b(?:url|expression|image-set|image|element|cross-fade|var|attr|env)\s*\()[#a-z0-9\s.,%()'"+-]+$/i;

const STYLE_PROPERTIES = [
  "color", "background-color",
  "font-size", "font-weight", "font-style", "font-family",
  "line-height", "letter-spacing",
  "text-align", "text-decoration", "text-transform", "vertical-align",
  "margin", "margin-top", "margin-right", "margin-bottom", "margin-left",
  "padding", "padding-top", "padding-right", "padding-bottom", "padding-left",
  "border", "border-top", "border-right", "border-bottom", "border-left",
  "border-color", "border-width", "border-style", "border-radius", "border-collapse",
  "width", "height", "max-width", "max-height", "min-width", "min-height",
  "display", "float", "clear",
];

const HTTP_URL = /^https?:\/\//i;

export class ContentSanitizer {
  private readonly imageUrlPrefix: string;
  private readonly options: IOptions;

  constructor(imageUrlPrefix: string) {
    this.imageUrlPrefix = imageUrlPrefix.replace(/\/+$/, "");
    this.options = {
      allowedTags: ALLOWED_TAGS,
      nonTextTags: DROPPED_WITH_CONTENT,
      allowedAttributes: {
        "*": ["style", "align", "title", "dir"],
        a: ["href", "title", "target", "rel", "name"],
        img: ["src", "alt", "title", "width", "height"],
        table: TABLE_ATTRS,
        td: CELL_ATTRS,
        th: CELL_ATTRS,
        col: ["span", "width"],
        font: ["color", "face", "size"],
        ol: ["start", "type"],
      },
      allowedSchemes: ["http", "https"],
      allowedSchemesByTag: {},
      allowProtocolRelative: false,
      allowedStyles: {
        "*": Object.fromEntries(STYLE_PROPERTIES.map((p) => [p, [SAFE_VALUE]])),
      },
      transformTags: {
        img: (tagName, attribs) => {
          const { src, ...rest } = attribs;
          return {
            tagName,
            attribs: src !== undefined && this.isAllowedImageSrc(src) ? { ...rest, src } : rest,
          };
        },
      },
      exclusiveFilter: (frame) => frame.tag === "img" && !frame.attribs.src,
    };
  }

  /** Remote images, or files already copied into the image store. */
  isAllowedImageSrc(src: string): boolean {
    const value = src.trim();
    if (HTTP_URL.test(value)) return true;
    return (
      value.startsWith(`${this.imageUrlPrefix}/`) &&
      !value.startsWith("//") &&
      !value.includes("..")
    );
  }

  clean(html: string): string {
    return sanitizeHtml(html, this.options);
  }

  sanitize(input: StagedHtml<"images-resolved">): StagedHtml<"sanitized"> {
    return staged("sanitized", this.clean(input.html));
  }
}
