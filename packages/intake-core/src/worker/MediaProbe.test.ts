import { expect } from 'chai';
import type ffmpeg from 'fluent-ffmpeg';
import { createFfprobeDurationProbe, durationFromProbe } from './MediaProbe.js';

function probeData(formatDuration: number | undefined, streamDurations: Array<string | undefined>): ffmpeg.FfprobeData {
    return {
        format: { duration: formatDuration },
        streams: streamDurations.map((duration, index) => ({ index, duration })),
        chapters: [],
    };
}

describe('MediaProbe', function() {
    it('prefers the container duration', function() {
        expect(durationFromProbe(probeData(612.4, ['600.0']))).to.equal(612.4);
    });

    it('falls back to the longest stream', function() {
        expect(durationFromProbe(probeData(undefined, ['12.5', '13.25', undefined]))).to.equal(13.25);
    });

    it('has no duration without usable values', function() {
        expect(durationFromProbe(probeData(undefined, ['N/A']))).to.equal(null);
    });

    it('answers null when ffprobe cannot run', async function() {
        const probe = createFfprobeDurationProbe('/nonexistent/ffprobe');
        expect(await probe('/nonexistent/clip.mp4')).to.equal(null);
    });
});
