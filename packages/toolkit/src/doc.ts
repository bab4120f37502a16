export interface ParsedDoc {
  summary: string;
  params: Map<string, string>;
}

const PARAM_LINE = /^@param\s+([A-Za-z0-9_$.-]+)\s*(?:-\s*)?(.*)$/;

export function parseDoc(doc: string | undefined): ParsedDoc {
  const params = new Map<string, string>();
  if (!doc) {
    return { summary: "", params };
  }

  // tolerate text pasted from a JSDoc block
  const lines = doc
    .split("\n")
    .map((line) => line.trim().replace(/^\*\s?/, ""));

  const first = lines.find((line) => line.length > 0 && !line.startsWith("@"));
  const summary = first ? first.split(/\.\s+/)[0].trim() : "";

  for (const line of lines) {
    const match = PARAM_LINE.exec(line);
    if (match && match[2].trim()) {
      params.set(match[1], match[2].trim());
    }
  }

  return { summary, params };
}
