/** Controller responses wrap their payload: `{ meta: { rc: "ok" }, data: [...] }` */
interface Envelope {
  meta?: { rc?: string; count?: number };
  data: unknown[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEnvelope(value: unknown): value is Envelope {
  return isRecord(value) && Array.isArray(value.data);
}

/** Pick specific fields from objects, arrays or `{ data: [...] }` envelopes */
export function pickFields(data: unknown, fields: string[]): unknown {
  if (!fields.length) return data;

  const pick = (obj: unknown): unknown => {
    if (!isRecord(obj)) return obj;
    const result: Record<string, unknown> = {};
    for (const f of fields) {
      if (f in obj) result[f] = obj[f];
    }
    return result;
  };

  if (Array.isArray(data)) return data.map(pick);
  if (isEnvelope(data)) return { ...data, data: data.data.map(pick) };
  return pick(data);
}

export function formatOutput(data: unknown, format: string): string {
  switch (format) {
    case "jsonl":
      if (Array.isArray(data)) return data.map((d) => JSON.stringify(d)).join("\n");
      if (isEnvelope(data)) return data.data.map((d) => JSON.stringify(d)).join("\n");
      return JSON.stringify(data);
    case "table":
      return formatTable(data);
    case "json":
    default:
      return JSON.stringify(data, null, 2);
  }
}

function formatTable(data: unknown): string {
  let items: unknown[];
  let meta = "";

  if (isEnvelope(data)) {
    items = data.data;
    if (data.meta?.rc) meta = `(${items.length} results, rc=${data.meta.rc})`;
  } else if (Array.isArray(data)) {
    items = data;
  } else if (isRecord(data)) {
    items = [data];
  } else {
    return String(data);
  }

  const rows = items.filter(isRecord);
  if (!rows.length) return "(no results)";

  const keys = [...new Set(rows.flatMap((item) => Object.keys(item)))];

  const fmt = (v: unknown): string => {
    if (v === null || v === undefined) return "";
    if (typeof v === "object") return JSON.stringify(v);
    return String(v);
  };

  const widths = keys.map((k) => {
    const vals = rows.map((item) => fmt(item[k]));
    return Math.min(60, Math.max(k.length, ...vals.map((v) => v.length)));
  });

  const header = keys.map((k, i) => k.padEnd(widths[i])).join("  ");
  const sep = widths.map((w) => "─".repeat(w)).join("──");
  const lines = rows.map((item) =>
    keys
      .map((k, i) => {
        const s = fmt(item[k]);
        return s.length > widths[i] ? s.slice(0, widths[i] - 1) + "…" : s.padEnd(widths[i]);
      })
      .join("  "),
  );

  const parts = [header, sep, ...lines];
  if (meta) parts.push("", meta);
  return parts.join("\n");
}
