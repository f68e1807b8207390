import { promises as fs } from "fs";
import * as path from "path";
import { logger, errorMessage } from "../logger.js";
import { withLock } from "../locking.js";

export interface SnapshotStore<T> {
    load(): Promise<T>;
    save(snapshot: T): Promise<void>;
}

export class FileStore<T> implements SnapshotStore<T> {
   private readonly filePath: string;

   constructor(
    private readonly dataDir: string,
    fileName: string,
    private readonly defaults: () => T,
    private readonly parse: (raw: unknown) => T,
   ) {
    this.filePath = path.join(dataDir, fileName);
   }

   get file(): string {
    return this.filePath;
   }

   async load(): Promise<T> {
    await fs.mkdir(this.dataDir, { recursive: true });
    let raw: string;
    try {
        raw = await fs.readFile(this.filePath, "utf8");
    } catch (e: unknown) {
        logger.warn("No existing state; starting empty", { file: this.filePath, error: errorMessage(e) });
        return this.defaults();
    }
    try {
        const parsed = this.parse(JSON.parse(raw));
        logger.info("State loaded", { file: this.filePath });
        return parsed;
    } catch (e: unknown) {
        logger.warn("State file unreadable; starting empty", { file: this.filePath, error: errorMessage(e) });
        return this.defaults();
    }
   }

   async save(snapshot: T): Promise<void> {
    // one writer per file; a later save never lands under an earlier one
    await withLock(`file:${this.filePath}`, async () => {
        await fs.mkdir(this.dataDir, { recursive: true });
        const tmp = this.filePath + ".tmp";
        await fs.writeFile(tmp, JSON.stringify(snapshot, null, 2), "utf8");
        await fs.rename(tmp, this.filePath);
    });
    logger.debug("State saved", { file: this.filePath });
   }
}

/** Keeps snapshots in memory; used by tests and dry runs. */
export class MemoryStore<T> implements SnapshotStore<T> {
    saves = 0;
    failNext = false;

    constructor(private current: T) {}

    async load(): Promise<T> {
        return structuredClone(this.current);
    }

    async save(snapshot: T): Promise<void> {
        if (this.failNext) {
            this.failNext = false;
            throw new Error("simulated write failure");
        }
        this.current = structuredClone(snapshot);
        this.saves++;
    }

    peek(): T {
        return this.current;
    }
}
