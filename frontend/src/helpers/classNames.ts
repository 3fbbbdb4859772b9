type ClassValue = string | false | null | undefined | Record<string, boolean>;

/** `classNames('a', cond && 'b', { c: isOpen })` → `"a b c"` with falsy parts dropped. */
const classNames = (...values: ClassValue[]): string => {
  const out: string[] = [];
  for (const value of values) {
    if (!value) continue;
    if (typeof value === 'string') {
      out.push(value);
    } else {
      for (const [name, enabled] of Object.entries(value)) {
        if (enabled) out.push(name);
      }
    }
  }
  return out.join(' ');
};

export default classNames;
