export interface NormalizeOptions {
  /** Regex sources removed wherever they match (case-insensitive). */
  boilerplatePatterns?: readonly string[];
  toMarkdown?: boolean;
}

// NUL, BOM, zero-width space/joiners, soft hyphen, replacement character.
const ARTIFACTS = /[\u0000\uFEFF\u200B\u200C\u200D\u00AD\uFFFD]/g;
const PAGE_MARKER = /^[ \t]*--- Page \d+ ---[ \t]*$/gm;

function compileBoilerplate(patterns: readonly string[]): RegExp[] {
  return patterns.map((p) => new RegExp(p, "gi"));
}

function toMarkdownHeadings(text: string): string {
  return text
    .split("\n")
    .map((line) => {
      const stripped = line.trim();
      return stripped && /[A-Z]/.test(stripped) && stripped === stripped.toUpperCase()
        ? `## ${stripped}`
        : stripped;
    })
    .join("\n");
}

/**
 * Turn extractor output into canonical text. Deterministic: the chunker's
 * offsets are only stable if this is.
 */
export function normalizeText(raw: string, options: NormalizeOptions = {}): string {
  let text = raw.normalize("NFC").replace(ARTIFACTS, "");

  text = text.replace(/\r\n?/g, "\n");
  // De-hyphenate words split across a line break: "emb-\nedding" -> "embedding".
  text = text.replace(/(\p{L})-\n[ \t]*(\p{Ll})/gu, "$1$2");
  text = text.replace(PAGE_MARKER, "");

  for (const re of compileBoilerplate(options.boilerplatePatterns ?? [])) {
    text = text.replace(re, "");
  }

  text = text.replace(/[ \t]+/g, " ");
  text = text.replace(/ +\n/g, "\n").replace(/\n +/g, "\n");
  text = text.replace(/\n{3,}/g, "\n\n");
  text = text.trim();

  if (options.toMarkdown) {
    text = toMarkdownHeadings(text);
  }
  return text;
}

