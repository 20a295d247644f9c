import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { OutputVideo } from '../../src/pipeline/encoder.js';
import { loadHistory } from '../../src/pipeline/history.js';
import {
  buildCaption,
  publishShort,
  thumbnailOffset,
  type PublishReceipt,
  type PublishRequest,
  type PublishTarget,
} from '../../src/pipeline/publisher.js';
import type { Script } from '../../src/pipeline/scriptwriter.js';
import { UploadError } from '../../src/utils/errors.js';
import { NonRetryableError } from '../../src/utils/retry.js';
import { fakeMedia, makeTempDir, removeDir } from '../helpers.js';

const script: Script = {
  topic:       'ocean',
  title:       'Stop. The ocean is hiding THIS',
  story:       'We have explored less than five percent of the ocean floor.',
  hashtags:    '#ocean #mystery #deepsea',
  contentType: 'facts',
};

function target(name: string) {
  return {
    name,
    publish: vi.fn<(req: PublishRequest) => Promise<PublishReceipt>>(async () => ({ target: name, id: `${name}-1` })),
  } satisfies PublishTarget;
}

describe('buildCaption', () => {
  it('puts the hashtags under the title', () => {
    expect(buildCaption(script)).toBe('Stop. The ocean is hiding THIS\n\n#ocean #mystery #deepsea #viral #fy #reels');
  });
});

describe('thumbnailOffset', () => {
  it('uses 4 s or half of a shorter video', () => {
    expect(thumbnailOffset(45)).toBe(4);
    expect(thumbnailOffset(6)).toBe(3);
  });
});

describe('publishShort', () => {
  let dir: string;
  let video: OutputVideo;
  let historyFile: string;

  beforeEach(() => {
    dir = makeTempDir();
    video = { path: path.join(dir, 'short.mp4'), durationSec: 45, sizeBytes: 2_048 };
    fs.writeFileSync(video.path, Buffer.alloc(2_048));
    historyFile = path.join(dir, 'used_content.json');
  });
  afterEach(() => removeDir(dir));

  const history = () => ({
    file: historyFile,
    assets: [
      { category: 'videos' as const, name: 'city.mp4' },
      { category: 'music' as const, name: 'calm.mp3' },
    ],
  });

  it('does nothing when no target is enabled', async () => {
    const media = fakeMedia();
    await expect(publishShort(media, [], video, script, { maxAttempts: 3, history: history() })).resolves.toEqual([]);
    expect(media.extractThumbnail).not.toHaveBeenCalled();
    expect(fs.existsSync(historyFile)).toBe(false);
  });

  it('extracts a cover and posts to every target', async () => {
    const media = fakeMedia();
    const instagram = target('instagram');
    const youtube = target('youtube');

    const receipts = await publishShort(media, [instagram, youtube], video, script, { maxAttempts: 3, history: history() });

    const coverPath = path.join(dir, 'short.jpg');
    expect(media.extractThumbnail).toHaveBeenCalledWith(video.path, 4, coverPath);
    expect(instagram.publish).toHaveBeenCalledWith({ videoPath: video.path, coverPath, script });
    expect(receipts).toEqual([
      { target: 'instagram', id: 'instagram-1' },
      { target: 'youtube', id: 'youtube-1' },
    ]);
    expect(loadHistory(historyFile)).toEqual({ videos: ['city.mp4'], music: ['calm.mp3'] });
  });

  it('retries a failing target', async () => {
    const instagram = target('instagram');
    instagram.publish.mockRejectedValueOnce(new Error('ECONNRESET'));

    await publishShort(fakeMedia(), [instagram], video, script, { maxAttempts: 2, baseDelayMs: 0 });
    expect(instagram.publish).toHaveBeenCalledTimes(2);
  });

  it('attempts every target and reports all failures together', async () => {
    const instagram = target('instagram');
    instagram.publish.mockRejectedValue(new NonRetryableError('login rejected'));
    const youtube = target('youtube');

    const promise = publishShort(fakeMedia(), [instagram, youtube], video, script, {
      maxAttempts: 3,
      baseDelayMs: 0,
      history: history(),
    });

    await expect(promise).rejects.toThrow(UploadError);
    await expect(promise).rejects.toThrow(`Upload failed (instagram: login rejected); video kept at ${video.path}`);
    expect(instagram.publish).toHaveBeenCalledTimes(1);
    expect(youtube.publish).toHaveBeenCalledTimes(1);
    expect(fs.existsSync(video.path)).toBe(true);
    expect(loadHistory(historyFile).videos).toEqual(['city.mp4']);
  });

  it('leaves the history alone when nothing was posted', async () => {
    const instagram = target('instagram');
    instagram.publish.mockRejectedValue(new NonRetryableError('checkpoint required'));

    await expect(publishShort(fakeMedia(), [instagram], video, script, { maxAttempts: 1, history: history() }))
      .rejects.toThrow(UploadError);
    expect(fs.existsSync(historyFile)).toBe(false);
  });

  it('fails when the cover cannot be extracted', async () => {
    const media = fakeMedia();
    media.extractThumbnail.mockRejectedValue(new Error('Output file is empty'));
    await expect(publishShort(media, [target('youtube')], video, script, { maxAttempts: 1 }))
      .rejects.toThrow('Could not extract cover frame: Output file is empty');
  });
});
