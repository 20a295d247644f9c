import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

const ig = vi.hoisted(() => {
  class IgLoginBadPasswordError extends Error {}
  class IgLoginInvalidUserError extends Error {}
  class IgLoginTwoFactorRequiredError extends Error {}
  class IgCheckpointError extends Error {}

  const state = { generateDevice: vi.fn(), deserialize: vi.fn(), serialize: vi.fn() };
  const account = { login: vi.fn(), currentUser: vi.fn() };
  const publish = { video: vi.fn() };

  class IgApiClient {
    state = state;
    account = account;
    publish = publish;
  }

  return {
    IgApiClient,
    IgLoginBadPasswordError,
    IgLoginInvalidUserError,
    IgLoginTwoFactorRequiredError,
    IgCheckpointError,
    state,
    account,
    publish,
  };
});

vi.mock('instagram-private-api', () => ({
  IgApiClient:                   ig.IgApiClient,
  IgLoginBadPasswordError:       ig.IgLoginBadPasswordError,
  IgLoginInvalidUserError:       ig.IgLoginInvalidUserError,
  IgLoginTwoFactorRequiredError: ig.IgLoginTwoFactorRequiredError,
  IgCheckpointError:             ig.IgCheckpointError,
}));

import { buildCaption } from '../../src/pipeline/publisher.js';
import type { Script } from '../../src/pipeline/scriptwriter.js';
import { createInstagramTarget } from '../../src/platforms/instagram.js';
import { NonRetryableError } from '../../src/utils/retry.js';
import { makeTempDir, removeDir } from '../helpers.js';

const script: Script = {
  topic:       'ocean',
  title:       'Stop. The ocean is hiding THIS',
  story:       'We have explored less than five percent of the ocean floor.',
  hashtags:    '#ocean #mystery',
  contentType: 'facts',
};

describe('createInstagramTarget', () => {
  let dir: string;
  let settings: {
    username: string;
    password: string;
    auto_upload: boolean;
    session_file: string;
    max_attempts: number;
  };
  let request: { videoPath: string; coverPath: string; script: Script };

  beforeEach(() => {
    vi.resetAllMocks();
    dir = makeTempDir();
    settings = {
      username:     'test-user',
      password:     'test-password',
      auto_upload:  true,
      session_file: path.join(dir, 'instagram_session.json'),
      max_attempts: 3,
    };
    request = { videoPath: path.join(dir, 'short.mp4'), coverPath: path.join(dir, 'short.jpg'), script };
    fs.writeFileSync(request.videoPath, 'video');
    fs.writeFileSync(request.coverPath, 'jpeg');

    ig.state.serialize.mockResolvedValue({ constants: { appVersion: '1' }, cookies: 'test-cookies' });
    ig.publish.video.mockResolvedValue({ media: { id: '17_42', code: 'ABC123' } });
  });
  afterEach(() => removeDir(dir));

  it('logs in, saves the session and posts the reel', async () => {
    const receipt = await createInstagramTarget(settings).publish(request);

    expect(receipt).toEqual({ target: 'instagram', id: '17_42', url: 'https://www.instagram.com/reel/ABC123/' });
    expect(ig.state.generateDevice).toHaveBeenCalledWith('test-user');
    expect(ig.account.login).toHaveBeenCalledWith('test-user', 'test-password');
    expect(JSON.parse(fs.readFileSync(settings.session_file, 'utf-8'))).toEqual({ cookies: 'test-cookies' });
    expect(ig.publish.video).toHaveBeenCalledWith({
      video:      Buffer.from('video'),
      coverImage: Buffer.from('jpeg'),
      caption:    buildCaption(script),
    });
  });

  it('reuses a saved session', async () => {
    fs.writeFileSync(settings.session_file, '{"cookies":"test-cookies"}');

    await createInstagramTarget(settings).publish(request);

    expect(ig.state.deserialize).toHaveBeenCalledWith('{"cookies":"test-cookies"}');
    expect(ig.account.login).not.toHaveBeenCalled();
  });

  it('logs in again when the saved session is rejected', async () => {
    fs.writeFileSync(settings.session_file, '{"cookies":"stale"}');
    ig.account.currentUser.mockRejectedValue(new Error('login_required'));

    await createInstagramTarget(settings).publish(request);
    expect(ig.account.login).toHaveBeenCalledTimes(1);
  });

  it('does not retry a rejected password', async () => {
    ig.account.login.mockRejectedValue(new ig.IgLoginBadPasswordError('bad password'));

    const promise = createInstagramTarget(settings).publish(request);
    await expect(promise).rejects.toThrow(NonRetryableError);
    await expect(promise).rejects.toThrow('Instagram login rejected: bad password');
  });

  it('lets transient login failures be retried', async () => {
    ig.account.login.mockRejectedValue(new Error('ECONNRESET'));

    const promise = createInstagramTarget(settings).publish(request);
    await expect(promise).rejects.toThrow('ECONNRESET');
    await expect(promise).rejects.not.toBeInstanceOf(NonRetryableError);
  });

  it('turns a checkpoint during upload into a final failure', async () => {
    ig.publish.video.mockRejectedValue(new ig.IgCheckpointError('challenge_required'));

    await expect(createInstagramTarget(settings).publish(request))
      .rejects.toThrow('Instagram checkpoint: challenge_required');
  });
});
