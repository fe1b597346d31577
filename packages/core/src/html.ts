/**
 * Undo the special-character escaping a framework applies to URLs for
 * output: `&amp;`, `&quot;`, `&lt;` and `&gt;`, plus numeric references to
 * those characters. Single quotes stay encoded. Single pass, so "&amp;lt;"
 * decodes to "&lt;".
 */

const NAMED: Readonly<Record<string, string>> = {
  amp: "&",
  quot: '"',
  lt: "<",
  gt: ">",
};

const SPECIAL_CODE_POINTS: ReadonlySet<number> = new Set([0x22, 0x26, 0x3c, 0x3e]);

const ENTITY_PATTERN = /&(?:(amp|quot|lt|gt)|#(\d+)|#[xX]([0-9a-fA-F]+));/g;

function decodeEntity(entity: string, name?: string, decimal?: string, hex?: string): string {
  if (name !== undefined) {
    return NAMED[name] ?? entity;
  }
  const codePoint =
    decimal !== undefined ? Number.parseInt(decimal, 10) : Number.parseInt(hex ?? "", 16);
  return SPECIAL_CODE_POINTS.has(codePoint) ? String.fromCodePoint(codePoint) : entity;
}

export function decodeHtmlEntities(str: string): string {
  return str.replace(
    ENTITY_PATTERN,
    (entity: string, name: string | undefined, decimal: string | undefined, hex: string | undefined) =>
      decodeEntity(entity, name, decimal, hex),
  );
}
