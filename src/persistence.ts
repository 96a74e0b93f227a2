import fs from "fs";
import path from "path";
import { PersistenceError, errorMessage } from "./errors.js";

const DEBOUNCE_MS = 5_000;

// ─── State collectors (registered by each module) ───

export type StateCollector = () => { section: string; data: unknown };

export interface LoadedState {
  [section: string]: unknown;
}

// ─── Format ───

/** Markdown with one `## Section` heading and one fenced JSON block per collector. */
export function renderState(sections: Array<{ section: string; data: unknown }>, savedAt: Date): string {
  let md = "# Sniper State\n\n";
  md += `_Last saved: ${savedAt.toISOString()}_\n\n`;
  for (const { section, data } of sections) {
    md += `## ${section}\n`;
    md += "```json\n";
    md += JSON.stringify(data, null, 2);
    md += "\n```\n\n";
  }
  return md;
}

export function parseState(content: string): LoadedState {
  const result: LoadedState = {};
  const headings = [...content.matchAll(/^## (.+)$/gm)];

  headings.forEach((heading, i) => {
    const name = heading[1].trim();
    const start = (heading.index ?? 0) + heading[0].length;
    const end = i + 1 < headings.length ? headings[i + 1].index ?? content.length : content.length;
    const block = /```json\n([\s\S]*?)```/.exec(content.slice(start, end));
    if (!block) throw new PersistenceError(`State section "${name}" has no JSON block`);
    try {
      result[name] = JSON.parse(block[1]);
    } catch (err) {
      throw new PersistenceError(`State section "${name}" is not valid JSON`, err);
    }
  });

  return result;
}

// ─── State file ───

/**
 * Collectors are polled on every save. Writes are debounced behind
 * `markDirty()` and land atomically (temp file, then rename).
 */
export class StateFile {
  private collectors: StateCollector[] = [];
  private dirty = false;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly filePath: string,
    private readonly debounceMs = DEBOUNCE_MS,
  ) {}

  registerCollector(collector: StateCollector): void {
    this.collectors.push(collector);
  }

  markDirty(): void {
    this.dirty = true;
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      if (!this.dirty) return;
      try {
        this.save();
      } catch (err) {
        console.error("[persistence] Save failed:", errorMessage(err));
      }
    }, this.debounceMs);
  }

  /** Write now if anything changed, cancelling a pending debounce. */
  flush(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.dirty) this.save();
  }

  save(): void {
    this.dirty = false;
    const md = renderState(this.collectors.map((collect) => collect()), new Date());
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmpFile = this.filePath + ".tmp";
      fs.writeFileSync(tmpFile, md, "utf-8");
      fs.renameSync(tmpFile, this.filePath);
    } catch (err) {
      this.dirty = true;
      throw new PersistenceError(`Cannot write ${this.filePath}`, err);
    }
    console.log("[persistence] State saved");
  }

  /** Missing file means a fresh start; an unreadable one is fatal. */
  load(): LoadedState {
    if (!fs.existsSync(this.filePath)) {
      console.log("[persistence] No state file found, starting fresh");
      return {};
    }
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      throw new PersistenceError(`Cannot read ${this.filePath}`, err);
    }
    const state = parseState(content);
    console.log(`[persistence] Loaded state: ${Object.keys(state).join(", ") || "(empty)"}`);
    return state;
  }

  close(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
