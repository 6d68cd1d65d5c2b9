/**
 * Literal markup-command escaping
 *
 * Extracted text from typeset reports can carry LaTeX-style commands.
 * They are replaced by inert placeholders before pattern matching and before
 * the text is quoted into a prompt. Plain substring replacement, applied in
 * table order.
 *
 * @module services/classification/markup
 */

export const MARKUP_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['\\hline', '_HLINE_'],
  ['\\begin', '_BEGIN_'],
  ['\\end', '_END_'],
  ['\\section', '_SECTION_'],
  ['\\\\', '_NEWLINE_'],
  ['\\tabular', '_TABULAR_'],
  ['\\multicolumn', '_MULTICOL_'],
  ['\\cite', '_CITE_'],
  ['\\ref', '_REF_'],
];

export function escapeMarkup(text: string | null | undefined): string {
  if (!text) return '';
  let escaped = text;
  for (const [literal, placeholder] of MARKUP_REPLACEMENTS) {
    escaped = escaped.split(literal).join(placeholder);
  }
  return escaped;
}
