export function pickArg(args: string[], name: string): string | null {
  const idx = args.indexOf(name);
  const next = idx !== -1 ? args[idx + 1] : undefined;
  if (next && !next.startsWith("--")) return next;
  for (const a of args) {
    if (a.startsWith(`${name}=`)) return a.slice(name.length + 1);
  }
  return null;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function pickListArg(args: string[], name: string): string[] {
  const out: string[] = [];
  args.forEach((a, idx) => {
    let raw: string | null = null;
    const next = args[idx + 1];
    if (a === name && next && !next.startsWith("--")) raw = next;
    else if (a.startsWith(`${name}=`)) raw = a.slice(name.length + 1);
    if (raw === null) return;
    for (const part of raw.split(",")) {
      const v = part.trim();
      if (v) out.push(v);
    }
  });
  return out;
}
