import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { PersistedStateCorrupt } from "../core/errors.js";
import type { Logger } from "../utils/logger.js";

// Unknown keys (a stray password included) are stripped on load and save.
const SettingsSchema = z.object({
  username: z.string().default(""),
  check_interval: z.number().int().positive().default(300),
  inbox_url: z.string().default("https://mail.google.com"),
  last_check_time: z.number().nonnegative().default(0),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const SETTINGS_FILE = "settings.json";

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

const initializedDirs = new Set<string>();

/**
 * Create the settings directory. Called once at startup; calling it again
 * for the same directory is a no-op.
 */
export async function initSettingsDir(dir: string): Promise<string> {
  if (initializedDirs.has(dir)) return dir;
  await mkdir(dir, { recursive: true });
  initializedDirs.add(dir);
  return dir;
}

/**
 * settings.json persistence. Every save overwrites the whole file; saves are
 * chained so two writes never interleave.
 */
export class SettingsStore {
  readonly path: string;
  private logger: Logger;
  private current: Settings = defaultSettings();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(dir: string, logger: Logger) {
    this.path = join(dir, SETTINGS_FILE);
    this.logger = logger;
  }

  /** Never rejects: a missing or corrupt file yields the defaults. */
  async load(): Promise<Settings> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if (!isNotFound(err)) {
        this.reportCorrupt(new PersistedStateCorrupt("Settings file unreadable", { cause: err }));
      }
      return this.reset();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.reportCorrupt(new PersistedStateCorrupt("Settings file is not valid JSON", { cause: err }));
      return this.reset();
    }

    const result = SettingsSchema.safeParse(parsed);
    if (!result.success) {
      this.reportCorrupt(
        new PersistedStateCorrupt("Settings file failed validation", { cause: result.error })
      );
      return this.reset();
    }

    this.current = result.data;
    return { ...this.current };
  }

  get settings(): Settings {
    return { ...this.current };
  }

  async save(settings: Settings): Promise<void> {
    const clean = SettingsSchema.parse(settings);
    this.current = clean;
    const body = JSON.stringify(clean, null, 4);

    const write = this.writeChain.then(() => writeFile(this.path, body, "utf-8"));
    // The chain only orders writes; the caller still sees this write's failure.
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  loadInterval(): number {
    return this.current.check_interval;
  }

  persistLastCheckTime(timestamp: number): Promise<void> {
    return this.save({ ...this.current, last_check_time: timestamp });
  }

  private reset(): Settings {
    this.current = defaultSettings();
    return { ...this.current };
  }

  private reportCorrupt(error: PersistedStateCorrupt): void {
    this.logger.warn({ error, path: this.path }, "Settings file corrupted, loading defaults");
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
