export function headerBlacklist(names: readonly string[]): ReadonlySet<string> {
  return new Set(names.map((n) => n.toLowerCase()))
}

// Drops the headers the provider manages itself
export function filterHeaders(headers: Record<string, string>, blacklist: ReadonlySet<string>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    if (!blacklist.has(name.toLowerCase())) out[name] = value
  }
  return out
}
