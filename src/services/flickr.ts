import axios, { type AxiosInstance } from 'axios';
import FormData from 'form-data';
import fs from 'fs';
import path from 'path';
import type { FlickrConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { FlickrApiError, UploadError, describeError } from '../utils/errors.js';
import { signRequest, type OAuthCredentials, type RequestParams } from './flickr-oauth.js';

export const REST_URL = 'https://api.flickr.com/services/rest/';
export const UPLOAD_URL = 'https://up.flickr.com/services/upload/';

export interface UploadParams {
  title: string;
  description?: string;
  /** Keywords; each is sent quoted so Flickr keeps multi-word keywords whole */
  tags: string[];
}

/**
 * Remote photo host operations used by the upload pipeline
 */
export interface PhotoService {
  upload(filePath: string, params: UploadParams): Promise<string>;
  setDatePosted(photoId: string, date: Date): Promise<void>;
  addToAlbum(albumId: string, photoId: string): Promise<void>;
}

interface FlickrRestResponse {
  stat: 'ok' | 'fail';
  code?: number;
  message?: string;
}

interface TestLoginResponse extends FlickrRestResponse {
  user?: {
    id: string;
    username?: { _content: string };
  };
}

export interface FlickrUser {
  id: string;
  username: string;
}

// Upload defaults: public, visible to friends and family, safe, a photo, not hidden
const UPLOAD_DEFAULTS: RequestParams = {
  is_public: '1',
  is_friend: '1',
  is_family: '1',
  safety_level: '1',
  content_type: '1',
  hidden: '1',
};

export function quoteTags(keywords: string[]): string {
  return keywords.map((keyword) => `"${keyword}"`).join(' ');
}

function decodeXmlEntities(value: string): string {
  return value
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

/**
 * Extract the photo id from the XML the upload endpoint answers with:
 * `<rsp stat="ok"><photoid>123</photoid></rsp>` or
 * `<rsp stat="fail"><err code="5" msg="..." /></rsp>`
 */
export function parseUploadResponse(xml: string): string {
  const photoId = /<photoid[^>]*>\s*([^<\s]+)\s*<\/photoid>/.exec(xml);
  if (/stat="ok"/.test(xml) && photoId) {
    return photoId[1];
  }

  const err = /<err\s+code="(\d+)"\s+msg="([^"]*)"/.exec(xml);
  if (err) {
    throw new FlickrApiError(parseInt(err[1], 10), decodeXmlEntities(err[2]));
  }

  throw new UploadError(`Unexpected upload response: ${xml.trim().slice(0, 200)}`);
}

export function photoUrl(username: string, photoId?: string): string {
  const base = `https://www.flickr.com/photos/${username}`;
  return photoId ? `${base}/${photoId}` : base;
}

export function editUrl(photoIds: string[]): string {
  return `https://www.flickr.com/photos/upload/edit/?ids=${photoIds.join(',')}`;
}

export class FlickrService implements PhotoService {
  private credentials: OAuthCredentials;
  private client: AxiosInstance;

  constructor(config: FlickrConfig, client?: AxiosInstance) {
    this.credentials = {
      consumerKey: config.apiKey,
      consumerSecret: config.apiSecret,
      token: config.oauthToken,
      tokenSecret: config.oauthTokenSecret,
    };
    this.client = client ?? axios.create({ timeout: 30000 });
  }

  /**
   * Call a REST method and fail on stat="fail"
   */
  private async call<T extends FlickrRestResponse>(method: string, params: RequestParams = {}): Promise<T> {
    const signed = signRequest(
      'GET',
      REST_URL,
      { ...params, method, format: 'json', nojsoncallback: '1' },
      this.credentials
    );

    const response = await this.client.get<T>(REST_URL, { params: signed });
    const data = response.data;

    if (!data || data.stat !== 'ok') {
      throw new FlickrApiError(data?.code ?? 0, data?.message ?? `No valid response to ${method}`);
    }
    logger.debug(`${method} ok`);
    return data;
  }

  async testLogin(): Promise<FlickrUser> {
    const data = await this.call<TestLoginResponse>('flickr.test.login');
    if (!data.user) {
      throw new FlickrApiError(0, 'flickr.test.login returned no user');
    }
    return { id: data.user.id, username: data.user.username?._content ?? '' };
  }

  async upload(filePath: string, params: UploadParams): Promise<string> {
    const fields: RequestParams = {
      ...UPLOAD_DEFAULTS,
      title: params.title,
      tags: quoteTags(params.tags),
    };
    if (params.description) {
      fields.description = params.description;
    }

    const signed = signRequest('POST', UPLOAD_URL, fields, this.credentials);
    const filename = path.basename(filePath);

    let body: string;
    try {
      const form = new FormData();
      for (const [name, value] of Object.entries(signed)) {
        form.append(name, value);
      }
      // The photo itself is not part of the OAuth signature
      form.append('photo', fs.readFileSync(filePath), { filename });

      const response = await this.client.post<string>(UPLOAD_URL, form, {
        headers: form.getHeaders(),
        responseType: 'text',
        maxContentLength: Infinity,
        maxBodyLength: Infinity,
        timeout: 120000,
      });
      body = response.data;
    } catch (error) {
      throw new UploadError(`Upload of ${filename} failed: ${describeError(error)}`);
    }

    const photoId = parseUploadResponse(body);
    logger.debug(`Uploaded ${filename} as photo ${photoId}`);
    return photoId;
  }

  /**
   * Set "date posted" so the photo sits at its capture time in the photostream
   */
  async setDatePosted(photoId: string, date: Date): Promise<void> {
    await this.call('flickr.photos.setDates', {
      photo_id: photoId,
      date_posted: String(Math.floor(date.getTime() / 1000)),
    });
  }

  async addToAlbum(albumId: string, photoId: string): Promise<void> {
    await this.call('flickr.photosets.addPhoto', { photoset_id: albumId, photo_id: photoId });
  }
}
