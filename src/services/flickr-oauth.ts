import crypto from 'crypto';

/**
 * OAuth 1.0a request signing (HMAC-SHA1) as required by the Flickr API.
 */

export interface OAuthCredentials {
  consumerKey: string;
  consumerSecret: string;
  token: string;
  tokenSecret: string;
}

export type RequestParams = Record<string, string>;

/**
 * RFC 3986 percent-encoding; encodeURIComponent leaves !'()* alone
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

export function buildSignatureBaseString(method: string, url: string, params: RequestParams): string {
  const normalized = Object.entries(params)
    .map(([key, value]) => [percentEncode(key), percentEncode(value)])
    .sort(([keyA, valueA], [keyB, valueB]) => {
      if (keyA !== keyB) return keyA < keyB ? -1 : 1;
      return valueA < valueB ? -1 : valueA > valueB ? 1 : 0;
    })
    .map(([key, value]) => `${key}=${value}`)
    .join('&');

  return [method.toUpperCase(), percentEncode(url), percentEncode(normalized)].join('&');
}

export function computeSignature(baseString: string, consumerSecret: string, tokenSecret: string): string {
  const key = `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
  return crypto.createHmac('sha1', key).update(baseString).digest('base64');
}

/**
 * Return `params` extended with the oauth_* fields and the signature.
 * `nonce` and `timestamp` are generated unless supplied.
 */
export function signRequest(
  method: string,
  url: string,
  params: RequestParams,
  credentials: OAuthCredentials,
  options: { nonce?: string; timestamp?: number } = {}
): RequestParams {
  const oauthParams: RequestParams = {
    oauth_consumer_key: credentials.consumerKey,
    oauth_nonce: options.nonce ?? crypto.randomBytes(16).toString('hex'),
    oauth_signature_method: 'HMAC-SHA1',
    oauth_timestamp: String(options.timestamp ?? Math.floor(Date.now() / 1000)),
    oauth_token: credentials.token,
    oauth_version: '1.0',
  };

  const allParams = { ...params, ...oauthParams };
  const baseString = buildSignatureBaseString(method, url, allParams);

  return {
    ...allParams,
    oauth_signature: computeSignature(baseString, credentials.consumerSecret, credentials.tokenSecret),
  };
}
