import { beforeEach, describe, it, expect, vi } from 'vitest';

vi.mock('child_process', () => ({
  execSync: vi.fn(),
}));

import { execSync } from 'child_process';
import {
  cutClip,
  extractThumbnail,
  formatSeconds,
  isFfmpegAvailable,
  normalizeAudio,
  probeDuration,
  probeVideo,
  quotePath,
} from '../../src/media/ffmpeg.js';

const exec = vi.mocked(execSync);

function commandOf(call: number): unknown {
  return exec.mock.calls[call]?.[0];
}

describe('ffmpeg wrapper', () => {
  beforeEach(() => {
    exec.mockReset();
  });

  it('quotes paths for the shell', () => {
    expect(quotePath('/tmp/a "b"$x')).toBe('"/tmp/a \\"b\\"\\$x"');
  });

  it('formats seconds with millisecond precision', () => {
    expect(formatSeconds(12.5)).toBe('12.500');
  });

  it('reports whether ffmpeg answers', () => {
    exec.mockReturnValueOnce('ffmpeg version 6.1');
    expect(isFfmpegAvailable()).toBe(true);

    exec.mockImplementationOnce(() => { throw new Error('ffmpeg: not found'); });
    expect(isFfmpegAvailable()).toBe(false);
  });

  it('probes the container duration', async () => {
    exec.mockReturnValueOnce('12.345\n');
    await expect(probeDuration('/tmp/narration.mp3')).resolves.toBe(12.345);
    expect(commandOf(0)).toBe('ffprobe -v error -show_entries format=duration -of csv=p=0 "/tmp/narration.mp3"');
  });

  it('rejects an unusable duration', async () => {
    exec.mockReturnValueOnce('N/A');
    await expect(probeDuration('/tmp/broken.mp3')).rejects.toThrow(/no usable duration/);
  });

  it('probes frame size and duration', async () => {
    exec.mockReturnValueOnce('1920,1080\n').mockReturnValueOnce('600.5\n');
    await expect(probeVideo('/videos/city.mp4')).resolves.toEqual({ duration: 600.5, width: 1920, height: 1080 });
    expect(commandOf(0)).toBe(
      'ffprobe -v error -select_streams v:0 -show_entries stream=width,height -of csv=s=,:p=0 "/videos/city.mp4"',
    );
  });

  it('rejects a file without a video stream', async () => {
    exec.mockReturnValueOnce('');
    await expect(probeVideo('/music/calm.mp3')).rejects.toThrow('FFprobe probeVideo: no video stream in /music/calm.mp3');
  });

  it('cuts a silent, re-encoded clip', async () => {
    await cutClip('/videos/city.mp4', { start: 12.5, duration: 60 }, '/tmp/run/clip.mp4');
    expect(commandOf(0)).toBe(
      'ffmpeg -y -hide_banner -ss 12.500 -t 60.000 -i "/videos/city.mp4" ' +
      '-an -c:v libx264 -preset veryfast -crf 18 -pix_fmt yuv420p "/tmp/run/clip.mp4"',
    );
  });

  it('levels narration into a mono MP3', async () => {
    await normalizeAudio('/tmp/run/narration.mp3', '/tmp/run/narration.normalized.mp3');
    expect(commandOf(0)).toBe(
      'ffmpeg -y -hide_banner -i "/tmp/run/narration.mp3" ' +
      '-af "highpass=f=80,loudnorm=I=-16:TP=-1.5:LRA=11,' +
      'compand=attacks=0.3:decays=0.8:points=-80/-80|-45/-45|-27/-25|0/-7:soft-knee=6:gain=0:volume=0" ' +
      '-ar 22050 -ac 1 -b:a 128k "/tmp/run/narration.normalized.mp3"',
    );
  });

  it('extracts a single thumbnail frame', async () => {
    await extractThumbnail('/out/short.mp4', 4, '/out/short.jpg');
    expect(commandOf(0)).toBe('ffmpeg -y -hide_banner -ss 4.000 -i "/out/short.mp4" -frames:v 1 -q:v 2 "/out/short.jpg"');
  });

  it('surfaces ffmpeg stderr on failure', async () => {
    exec.mockImplementationOnce(() => {
      throw Object.assign(new Error('Command failed'), { stderr: Buffer.from('/videos/gone.mp4: No such file or directory\n') });
    });
    await expect(cutClip('/videos/gone.mp4', { start: 0, duration: 5 }, '/tmp/clip.mp4'))
      .rejects.toThrow('FFmpeg cutClip failed: /videos/gone.mp4: No such file or directory');
  });
});
