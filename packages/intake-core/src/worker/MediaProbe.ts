import ffmpeg from 'fluent-ffmpeg';
import { errorMessage } from '../errors/IntakeErrors.js';

/** Duration in seconds, null when it cannot be read */
export type DurationProbe = (localPath: string) => Promise<number | null>;

/**
 * Duration from the container format, falling back to the longest stream
 */
export function durationFromProbe(data: ffmpeg.FfprobeData): number | null {
    const format = Number(data.format.duration);
    if (Number.isFinite(format) && format > 0) {
        return format;
    }
    const streams = data.streams
        .map((stream) => Number(stream.duration))
        .filter((value) => Number.isFinite(value) && value > 0);
    return streams.length > 0 ? Math.max(...streams) : null;
}

export function createFfprobeDurationProbe(ffprobePath: string): DurationProbe {
    return (localPath) => new Promise((resolve) => {
        ffmpeg(localPath)
            .setFfprobePath(ffprobePath)
            .ffprobe((err: unknown, data: ffmpeg.FfprobeData) => {
                if (err) {
                    console.warn(`[Worker] ffprobe of ${localPath} failed: ${errorMessage(err)}`);
                    resolve(null);
                    return;
                }
                resolve(durationFromProbe(data));
            });
    });
}
