const ENABLED = (process.env.NIZKIT_DEBUG ?? "").split(",").map(s => s.trim());
export function debug(ns: string, ...args: unknown[]) {
  if (ENABLED.includes("*") || ENABLED.includes(ns)) console.log(`[${ns}]`, ...args);
}
