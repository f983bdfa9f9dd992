/**
 * Environment-driven diagnostics.
 *
 * Flags are read once; tests that flip them call `resetDebugFlags()`.
 */

type DebugFlags = {
  locks: boolean;
  memmap: boolean;
};

let flags: DebugFlags | null = null;

function readEnv(name: string): string | undefined {
  return typeof process !== "undefined" ? process.env?.[name] : undefined;
}

function getFlags(): DebugFlags {
  if (!flags) {
    flags = {
      locks: readEnv("TENSORTREE_DEBUG_LOCKS") === "1",
      memmap: readEnv("TENSORTREE_DEBUG_MEMMAP") === "1",
    };
  }
  return flags;
}

export function resetDebugFlags(): void {
  flags = null;
}

export function debugLocks(message: string): void {
  if (getFlags().locks) console.log(`[lock-graph] ${message}`);
}

export function debugMemmap(message: string): void {
  if (getFlags().memmap) console.log(`[memmap] ${message}`);
}

/** Base directory for anonymous memmaps, or undefined for the OS temp dir. */
export function memmapBaseDir(): string | undefined {
  const dir = readEnv("TENSORTREE_MEMMAP_DIR");
  return dir && dir.length > 0 ? dir : undefined;
}
