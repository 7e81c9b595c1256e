import { promises as fs } from 'fs';
import type { AssetRepository } from '../persistence/AssetRepository.js';

/** Free bytes available to an unprivileged user on the filesystem of `dir` */
export type DiskProbe = (dir: string) => Promise<number>;

export const statfsProbe: DiskProbe = async (dir) => {
    await fs.mkdir(dir, { recursive: true });
    const stats = await fs.statfs(dir);
    return stats.bavail * stats.bsize;
};

export interface BackpressureOptions {
    /** Processing cache whose filesystem is checked */
    cacheDir: string;
    minFreeDiskBytes: number;
    maxBacklog: number;
    diskProbe?: DiskProbe;
}

export interface BackpressureStatus {
    allowed: boolean;
    reason: string | null;
    freeDiskBytes: number;
    /** Assets currently in `processing` */
    backlog: number;
}

const GB = 1024 ** 3;

/**
 * Soft intake gate: low disk or a long processing backlog pauses new work
 * until the next cycle.
 */
export class BackpressureGovernor {
    private readonly diskProbe: DiskProbe;
    private lastReason: string | null = null;

    constructor(
        private readonly repository: Pick<AssetRepository, 'countByStatus'>,
        private readonly options: BackpressureOptions
    ) {
        this.diskProbe = options.diskProbe ?? statfsProbe;
    }

    async check(): Promise<BackpressureStatus> {
        const [freeDiskBytes, backlog] = await Promise.all([
            this.diskProbe(this.options.cacheDir),
            this.repository.countByStatus('processing'),
        ]);

        let reason: string | null = null;
        if (freeDiskBytes < this.options.minFreeDiskBytes) {
            reason = `free disk ${(freeDiskBytes / GB).toFixed(1)}GB below ${(this.options.minFreeDiskBytes / GB).toFixed(1)}GB`;
        } else if (backlog > this.options.maxBacklog) {
            reason = `backlog ${backlog} above ${this.options.maxBacklog}`;
        }

        // Log transitions only, the worker asks once per file
        if (reason !== this.lastReason) {
            if (reason) {
                console.warn(`[Backpressure] Intake paused: ${reason}`);
            } else {
                console.log('[Backpressure] Intake resumed');
            }
            this.lastReason = reason;
        }
        return { allowed: reason === null, reason, freeDiskBytes, backlog };
    }

    async allowIntake(): Promise<boolean> {
        return (await this.check()).allowed;
    }
}
