import type { z } from "zod";

export type ModelJsonResult<T> = { success: true; data: T } | { success: false; issues: string[] };

// Fenced block first, then the whole reply, then the outermost braces.
function candidates(reply: string): string[] {
  const t = reply.trim();
  const out: string[] = [];
  const fence = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(t);
  if (fence) out.push(fence[1]);
  out.push(t);
  const first = t.indexOf("{");
  const last = t.lastIndexOf("}");
  if (first !== -1 && last > first) out.push(t.slice(first, last + 1));
  return out;
}

function tryParse(body: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

/**
 * Validates a model's JSON reply against `schema`. The first candidate body that
 * both parses and validates wins; issues from every rejected candidate are kept.
 */
export function parseModelJson<S extends z.ZodTypeAny>(reply: string, schema: S): ModelJsonResult<z.output<S>> {
  const issues: string[] = [];
  let parsedAny = false;
  for (const body of candidates(reply)) {
    const json = tryParse(body);
    if (!json.ok) continue;
    parsedAny = true;
    const res = schema.safeParse(json.value);
    if (res.success) return { success: true, data: res.data };
    issues.push(...res.error.issues.map((i) => `${i.path.join(".") || "reply"}: ${i.message}`));
  }
  return { success: false, issues: parsedAny ? [...new Set(issues)] : ["reply is not JSON"] };
}
