function safeJson(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    const text = JSON.stringify(
      value,
      (_key, v: unknown) => {
        if (!v || typeof v !== "object") return v;
        if (seen.has(v)) return "[circular]";
        seen.add(v);
        return v;
      },
      2,
    );
    return text ?? String(value);
  } catch {
    return String(value);
  }
}

function nestedMessages(obj: Record<string, unknown>): string[] {
  const errors = obj.errors;
  if (!Array.isArray(errors)) return [];
  return errors.map((e: unknown) => formatError(e)).filter((x) => x.length > 0);
}

// Own properties, including non-enumerable ones such as AggregateError#errors.
function ownFields(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const key of Object.getOwnPropertyNames(obj)) out[key] = Reflect.get(obj, key);
  return out;
}

function stringField(obj: Record<string, unknown>, key: string): string {
  const v = obj[key];
  return typeof v === "string" ? v.trim() : "";
}

// Renders any thrown value as a single log-friendly line.
export function formatError(err: unknown): string {
  if (typeof err === "string") {
    const s = err.trim();
    return s.length > 0 ? s : "unknown_error";
  }

  if (err instanceof Error) {
    const msg = String(err.message ?? "").trim();
    const fields = ownFields(err);
    const cause = err.cause !== undefined ? formatError(err.cause) : "";
    if (msg.length > 0) return cause && cause !== "unknown_error" ? `${msg} (cause: ${cause})` : msg;
    const nested = nestedMessages(fields);
    if (nested.length > 0) return nested.join(" | ");
    const code = stringField(fields, "code");
    if (code.length > 0) return code;
    return err.name || "unknown_error";
  }

  if (err && typeof err === "object") {
    const obj = ownFields(err);
    const nested = nestedMessages(obj);
    if (nested.length > 0) return nested.join(" | ");
    const code = stringField(obj, "code");
    if (code.length > 0) {
      const msg = stringField(obj, "message");
      return msg.length > 0 ? `${code}: ${msg}` : code;
    }
    const json = safeJson(obj);
    return json.trim().length > 0 ? json : "unknown_error";
  }

  const s = String(err ?? "").trim();
  return s.length > 0 ? s : "unknown_error";
}
