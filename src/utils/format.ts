const BETWEEN_TAGS = /(>)(<)(\/*)/g;
const INLINE_ELEMENT = /.+<\/\w[^>]*>$/;
const CLOSING_TAG = /^<\/\w/;
const OPENING_TAG = /^<\w([^>]*[^\/])?>.*$/;

export function formatXml(xml: string, indent = "  "): string {
  const lines = xml.replace(BETWEEN_TAGS, "$1\n$2$3").split("\n");
  const out: string[] = [];
  let depth = 0;

  for (const line of lines) {
    let opens = 0;
    if (INLINE_ELEMENT.test(line)) {
      opens = 0;
    } else if (CLOSING_TAG.test(line)) {
      depth = Math.max(0, depth - 1);
    } else if (OPENING_TAG.test(line)) {
      opens = 1;
    }

    out.push(`${indent.repeat(depth)}${line}`);
    depth += opens;
  }

  return out.join("\n");
}
