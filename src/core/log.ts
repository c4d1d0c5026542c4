/**
 * Tagged console output: `  [tag] message`.
 */

let quiet = false;

export function setQuiet(value: boolean): void {
  quiet = value;
}

export function logTag(tag: string, message: string): void {
  if (quiet) return;
  console.log(`  [${tag}] ${message}`);
}

export function warnTag(tag: string, message: string): void {
  console.error(`  ⚠️  [${tag}] ${message}`);
}
