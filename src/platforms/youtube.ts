/**
 * YouTube Shorts publisher: YouTube Data API v3 via googleapis.
 * Always sets selfDeclaredMadeForKids: false.
 *
 * Auth uses an installed-app OAuth client (`youtube.client_secrets_file`) and
 * a saved token (`youtube.token_file`) holding at least a refresh token.
 * Refreshed tokens are written back to the token file.
 */
import * as fs from 'fs';
import { google } from 'googleapis';
import { z } from 'zod';
import type { ShortsConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError } from '../utils/retry.js';
import { errorMessage } from '../utils/errors.js';
import type { PublishReceipt, PublishRequest, PublishTarget } from '../pipeline/publisher.js';
import type { Script } from '../pipeline/scriptwriter.js';

// ── Constants ─────────────────────────────────────────────────────────────────

const MAX_TITLE_LENGTH = 100;
const DESCRIPTION_STORY_CHARS = 200;
const DESCRIPTION_SUFFIX = ' #viral #viralvideo #shorts #Shorts';
const PEOPLE_AND_BLOGS = '22';

// ── Credentials ───────────────────────────────────────────────────────────────

const OAuthClientSchema = z.object({
  client_id:     z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).default([]),
});

const ClientSecretsSchema = z.union([
  z.object({ installed: OAuthClientSchema }).transform(s => s.installed),
  z.object({ web: OAuthClientSchema }).transform(s => s.web),
]);

const TokenSchema = z.object({
  access_token:  z.string().optional(),
  refresh_token: z.string().min(1),
  expiry_date:   z.number().optional(),
  token_type:    z.string().optional(),
  scope:         z.string().optional(),
});

function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, what: string): z.output<S> {
  if (!fs.existsSync(filePath)) {
    throw new NonRetryableError(`YouTube ${what} not found: ${filePath}`);
  }
  try {
    return schema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  } catch (err) {
    throw new NonRetryableError(`YouTube ${what} is invalid (${filePath}): ${errorMessage(err)}`, err);
  }
}

// ── Metadata ──────────────────────────────────────────────────────────────────

export interface YouTubeMetadata {
  title: string;
  description: string;
  tags: string[];
}

export function buildYouTubeMetadata(script: Pick<Script, 'title' | 'story' | 'hashtags'>): YouTubeMetadata {
  const story = script.story.length > DESCRIPTION_STORY_CHARS
    ? `${script.story.slice(0, DESCRIPTION_STORY_CHARS)}...`
    : script.story;
  return {
    title:       script.title.slice(0, MAX_TITLE_LENGTH),
    description: `${story}\n\n${script.hashtags}${DESCRIPTION_SUFFIX}`,
    tags:        script.hashtags.split(/\s+/).map(t => t.replace(/^#/, '')).filter(Boolean),
  };
}

// ── Public API ─────────────────────────────────────────────────────────────────

export function createYouTubeTarget(settings: ShortsConfig['youtube']): PublishTarget {
  function authorize() {
    const secrets = readJsonFile(settings.client_secrets_file, ClientSecretsSchema, 'client secrets');
    const token = readJsonFile(settings.token_file, TokenSchema, 'token file');

    const auth = new google.auth.OAuth2(secrets.client_id, secrets.client_secret, secrets.redirect_uris[0]);
    auth.setCredentials(token);
    auth.on('tokens', refreshed => {
      fs.writeFileSync(settings.token_file, JSON.stringify({ ...token, ...refreshed }, null, 2), 'utf-8');
      logger.debug('YouTube: refreshed token saved', { tokenFile: settings.token_file });
    });
    return auth;
  }

  return {
    name: 'youtube',

    async publish(req: PublishRequest): Promise<PublishReceipt> {
      const youtube = google.youtube({ version: 'v3', auth: authorize() });
      const meta = buildYouTubeMetadata(req.script);
      logger.info('YouTube: uploading Short', { title: meta.title, privacy: settings.privacy_status });

      const res = await youtube.videos.insert({
        part: ['snippet', 'status'],
        requestBody: {
          snippet: {
            title:       meta.title,
            description: meta.description,
            tags:        meta.tags,
            categoryId:  PEOPLE_AND_BLOGS,
          },
          status: {
            privacyStatus:           settings.privacy_status,
            selfDeclaredMadeForKids: false,
          },
        },
        media: { body: fs.createReadStream(req.videoPath) },
      });

      const id = res.data.id;
      if (!id) {
        throw new Error('YouTube accepted the upload but returned no video id');
      }
      const url = `https://youtube.com/shorts/${id}`;
      logger.info('YouTube: Short published', { id, url });
      return { target: 'youtube', id, url };
    },
  };
}
