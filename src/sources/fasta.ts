import type { ProteinRecord } from "../types.js";

/**
 * Parses FASTA text into protein records. Multi-record input is split on `>`
 * headers; the first header token becomes the id and the rest the name.
 * Text with no header at all is read as one bare sequence.
 */
export function parseFasta(raw: string): ProteinRecord[] {
  const text = raw.trim();
  if (text.length === 0) return [];

  if (!text.startsWith(">") && !text.includes("\n>")) {
    const sequence = cleanSequence(text);
    return sequence ? [toRecord("query_1", "query_1", sequence)] : [];
  }

  const records: ProteinRecord[] = [];
  let header: string | null = null;
  let lines: string[] = [];

  const flush = () => {
    if (header === null) return;
    const sequence = cleanSequence(lines.join(""));
    if (sequence.length > 0) {
      const [id, ...rest] = header.split(/\s+/);
      const name = rest.join(" ").trim();
      records.push(toRecord(id, name || id, sequence));
    }
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith(">")) {
      flush();
      header = line.slice(1).trim() || `query_${records.length + 1}`;
      lines = [];
    } else if (header !== null) {
      lines.push(line);
    }
  }
  flush();

  return records;
}

/** Uppercases and drops whitespace, digits and the trailing stop `*`. */
export function cleanSequence(sequence: string): string {
  return sequence.replace(/[\s\d]/g, "").replace(/\*$/, "").toUpperCase();
}

function toRecord(proteinId: string, proteinName: string, sequence: string): ProteinRecord {
  return {
    proteinId,
    proteinName,
    sequence,
    source: "user_input",
    organism: "User provided",
    keywords: [],
    annotatedLocation: "Unknown",
  };
}
