/**
 * Instagram Reels upload via the private mobile API.
 *
 * The logged-in session is persisted to `upload.session_file` so repeated
 * runs reuse it instead of logging in every time (frequent logins trigger
 * Instagram checkpoints).
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  IgApiClient,
  IgCheckpointError,
  IgLoginBadPasswordError,
  IgLoginInvalidUserError,
  IgLoginTwoFactorRequiredError,
} from 'instagram-private-api';
import type { ShortsConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError } from '../utils/retry.js';
import { errorMessage } from '../utils/errors.js';
import { buildCaption, type PublishReceipt, type PublishRequest, type PublishTarget } from '../pipeline/publisher.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

function isAuthFailure(err: unknown): boolean {
  return (
    err instanceof IgLoginBadPasswordError ||
    err instanceof IgLoginInvalidUserError ||
    err instanceof IgLoginTwoFactorRequiredError ||
    err instanceof IgCheckpointError
  );
}

async function restoreSession(ig: IgApiClient, sessionFile: string): Promise<boolean> {
  if (!fs.existsSync(sessionFile)) return false;
  try {
    await ig.state.deserialize(fs.readFileSync(sessionFile, 'utf-8'));
    await ig.account.currentUser();
    logger.info('Instagram: reusing saved session', { sessionFile });
    return true;
  } catch (err) {
    logger.warn('Instagram: saved session rejected — logging in again', { error: errorMessage(err) });
    return false;
  }
}

async function saveSession(ig: IgApiClient, sessionFile: string): Promise<void> {
  const state: Record<string, unknown> = await ig.state.serialize();
  // Device constants are regenerated from the username on every start
  delete state['constants'];
  fs.mkdirSync(path.dirname(path.resolve(sessionFile)), { recursive: true });
  fs.writeFileSync(sessionFile, JSON.stringify(state), 'utf-8');
}

// ── Public API ─────────────────────────────────────────────────────────────────

export function createInstagramTarget(settings: ShortsConfig['upload']): PublishTarget {
  let client: IgApiClient | undefined;

  async function connect(): Promise<IgApiClient> {
    if (client) return client;

    const ig = new IgApiClient();
    ig.state.generateDevice(settings.username);

    if (!(await restoreSession(ig, settings.session_file))) {
      try {
        await ig.account.login(settings.username, settings.password);
      } catch (err) {
        if (isAuthFailure(err)) {
          throw new NonRetryableError(`Instagram login rejected: ${errorMessage(err)}`, err);
        }
        throw err;
      }
      await saveSession(ig, settings.session_file);
      logger.info('Instagram: logged in', { username: settings.username });
    }

    client = ig;
    return ig;
  }

  return {
    name: 'instagram',

    async publish(req: PublishRequest): Promise<PublishReceipt> {
      const ig = await connect();
      const caption = buildCaption(req.script);
      logger.info('Instagram: uploading Reel', { video: req.videoPath });

      try {
        const res = await ig.publish.video({
          video:      fs.readFileSync(req.videoPath),
          coverImage: fs.readFileSync(req.coverPath),
          caption,
        });
        const url = `https://www.instagram.com/reel/${res.media.code}/`;
        logger.info('Instagram: Reel published', { mediaId: res.media.id, url });
        return { target: 'instagram', id: res.media.id, url };
      } catch (err) {
        if (isAuthFailure(err)) {
          throw new NonRetryableError(`Instagram checkpoint: ${errorMessage(err)}`, err);
        }
        throw err;
      }
    },
  };
}
