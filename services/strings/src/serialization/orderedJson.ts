// src/serialization/orderedJson.ts
//
// JSON writer for reply payloads. Maps are written as JSON objects in entry order;
// plain objects would move integer-like keys ("1", "2") ahead of the rest.

function write(value: unknown): string | undefined {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') return undefined;
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (value instanceof Date) return JSON.stringify(value);

  if (value instanceof Map) {
    const members: string[] = [];
    for (const [key, entry] of value) {
      const json = write(entry);
      if (json !== undefined) members.push(`${JSON.stringify(String(key))}:${json}`);
    }
    return `{${members.join(',')}}`;
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => write(item) ?? 'null').join(',')}]`;
  }

  const members: string[] = [];
  for (const [key, entry] of Object.entries(value)) {
    const json = write(entry);
    if (json !== undefined) members.push(`${JSON.stringify(key)}:${json}`);
  }
  return `{${members.join(',')}}`;
}

export function toOrderedJson(payload: unknown): string {
  return write(payload) ?? 'null';
}
