import { DETECTION_LOG_SIZE } from "../config/constants";
import type { FaceBoundingBox } from "../types/face";

type EvictHandler = (fileName: string) => Promise<void>;

/**
 * Face boxes of the most recent captures, keyed by capture file name.
 * Oldest entries are evicted first and handed to `onEvict`.
 */
export class DetectionLog {
  private readonly entries = new Map<string, FaceBoundingBox>();

  constructor(
    private readonly capacity: number = DETECTION_LOG_SIZE,
    private readonly onEvict?: EvictHandler
  ) {}

  async remember(fileName: string, box: FaceBoundingBox): Promise<void> {
    this.entries.delete(fileName);
    this.entries.set(fileName, box);

    const evicted: string[] = [];
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      evicted.push(oldest.value);
    }

    if (this.onEvict) {
      for (const name of evicted) {
        await this.onEvict(name);
      }
    }
  }

  lookup(fileName: string): FaceBoundingBox | undefined {
    return this.entries.get(fileName);
  }

  get size(): number {
    return this.entries.size;
  }
}
