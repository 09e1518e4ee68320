/**
 * SnapshotStore - append-only JSON Lines file of metric snapshots
 *
 * Each snapshot is one line written with a single append. On load, a
 * trailing record without its newline (or one that does not parse) is a
 * torn write: it is dropped and the file is truncated back to the last
 * complete record, so the next append starts on a clean line. Offsets are
 * counted in bytes of the raw file; a line that is not valid UTF-8 is
 * unreadable, never re-encoded.
 */

import fs from "node:fs";
import path from "node:path";
import { TextDecoder } from "node:util";
import type { Logger } from "../../utils/logger.util";
import type { MetricSnapshot } from "../../core/types";

export class SnapshotStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  append(snapshot: MetricSnapshot): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify(snapshot)}\n`, "utf-8");
  }

  /**
   * Read every fully-written snapshot, oldest first
   */
  load(): MetricSnapshot[] {
    if (!fs.existsSync(this.filePath)) {
      this.logger.info(`[SnapshotStore] No snapshot history at ${this.filePath}`);
      return [];
    }

    const content = fs.readFileSync(this.filePath);
    const snapshots: MetricSnapshot[] = [];
    let validBytes = 0;
    let offset = 0;

    while (offset < content.length) {
      const newline = content.indexOf(NEWLINE, offset);
      const complete = newline !== -1;
      const end = complete ? newline : content.length;
      const line = decodeLine(content.subarray(offset, end));
      const lineBytes = end - offset + (complete ? 1 : 0);
      offset = complete ? newline + 1 : content.length;

      const parsed = complete && line !== null ? parseSnapshot(line) : null;
      if (parsed) {
        snapshots.push(parsed);
        validBytes += lineBytes;
        continue;
      }

      if (complete && line !== null && line.trim() === "") {
        validBytes += lineBytes;
        continue;
      }

      if (offset >= content.length) {
        this.logger.warn(
          `[SnapshotStore] Discarding torn trailing record in ${this.filePath} (${lineBytes} bytes)`,
        );
        fs.truncateSync(this.filePath, validBytes);
        break;
      }

      // A corrupt record in the middle is skipped; later records still count
      this.logger.warn(`[SnapshotStore] Skipping unreadable record in ${this.filePath}`);
      validBytes += lineBytes;
    }

    this.logger.info(`[SnapshotStore] Loaded ${snapshots.length} snapshot(s) from ${this.filePath}`);
    return snapshots;
  }

  /** Most recent fully-written snapshot */
  latest(): MetricSnapshot | undefined {
    const all = this.load();
    return all[all.length - 1];
  }
}

const NEWLINE = 0x0a;
const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeLine(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

function parseSnapshot(line: string): MetricSnapshot | null {
  try {
    const value: unknown = JSON.parse(line);
    return isMetricSnapshot(value) ? value : null;
  } catch {
    return null;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function isMetricSnapshot(value: unknown): value is MetricSnapshot {
  if (!isRecord(value)) return false;
  return (
    typeof value.timestamp === "string" &&
    typeof value.balance === "number" &&
    typeof value.peakBalance === "number" &&
    typeof value.drawdown === "number" &&
    isRecord(value.pnl) &&
    typeof value.winRate === "number" &&
    (value.sharpeRatio === null || typeof value.sharpeRatio === "number") &&
    isRecord(value.trades) &&
    isRecord(value.scan) &&
    isRecord(value.apiCalls) &&
    typeof value.halted === "boolean"
  );
}
