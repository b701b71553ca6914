function bracesBalance(value: string): boolean {
  if (value.includes("\\")) return false;
  let depth = 0;
  for (const ch of value) {
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

/** Quotes one word for an Alfred job script. */
export function tclWord(value: string): string {
  if (bracesBalance(value)) return `{${value}}`;
  return `"${value.replace(/[\\"$[\]{}]/g, (c) => `\\${c}`)}"`;
}

export function tclList(values: readonly string[]): string {
  return `{${values.map(tclWord).join(" ")}}`;
}

export function tclBool(value: boolean): string {
  return value ? "1" : "0";
}
