/**
 * TrajectoryLogger — Append-only JSONL trajectory writer.
 *
 * Records one line per accounted-for work unit and one per finished run
 * to <trajectoryDir>/trajectory.jsonl. Writes go through a WriteQueue so
 * concurrent runs sharing a logger never interleave partial lines.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { WriteQueue } from "./store/write-queue.js";
import type { ITrajectoryLogger, TrajectoryRecord } from "./types.js";

export class TrajectoryLogger implements ITrajectoryLogger {
  private dir: string;
  private trajectoryPath: string;
  private writeQueue = new WriteQueue();
  private pendingRecords: TrajectoryRecord[] = [];

  constructor(dir: string) {
    this.dir = dir;
    this.trajectoryPath = path.join(dir, "trajectory.jsonl");
  }

  /**
   * Buffer a record. Does not touch the filesystem; see flush().
   */
  append(record: TrajectoryRecord): void {
    this.pendingRecords.push(record);
  }

  /**
   * Write all buffered records as JSONL.
   *
   * The buffer is swapped out before writing, so records appended during
   * the write land in the next flush. On a failed write the swapped-out
   * records are dropped and the error is rethrown to the caller.
   * With nothing buffered, waits for writes already in progress.
   */
  async flush(): Promise<void> {
    if (this.pendingRecords.length === 0) {
      await this.writeQueue.flush();
      return;
    }

    const recordsToWrite = this.pendingRecords;
    this.pendingRecords = [];

    await this.writeQueue.enqueue("trajectory.flush", async () => {
      await fs.promises.mkdir(this.dir, { recursive: true });

      const lines = recordsToWrite.map((record) => JSON.stringify(record)).join("\n");
      await fs.promises.appendFile(this.trajectoryPath, lines + "\n");
    });
  }

  getTrajectoryPath(): string {
    return this.trajectoryPath;
  }

  getPendingCount(): number {
    return this.pendingRecords.length;
  }
}

/**
 * Read a trajectory file back into records. Blank lines are skipped.
 */
export async function readTrajectory(filePath: string): Promise<TrajectoryRecord[]> {
  const text = await fs.promises.readFile(filePath, "utf-8");
  return text
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line): TrajectoryRecord => JSON.parse(line));
}
