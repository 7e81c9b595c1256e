import { promises as fs } from 'fs';
import path from 'path';

/**
 * Per-file error log: {logsDir}/errors/{originFileId}.log, one "timestamp message" line per failure
 */
export class ErrorLog {
    private readonly dir: string;

    constructor(logsDir: string) {
        this.dir = path.join(logsDir, 'errors');
    }

    logPath(originFileId: string): string {
        return path.join(this.dir, `${originFileId.replace(/[^A-Za-z0-9._-]/g, '_')}.log`);
    }

    async append(originFileId: string, message: string, at: Date = new Date()): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        await fs.appendFile(this.logPath(originFileId), `${at.toISOString()} ${message}\n`, 'utf8');
    }
}
