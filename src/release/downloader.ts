/**
 * HTTP Downloader
 * Fetches release metadata and archive files with redirect following.
 * Single attempt per call: failures surface as NetworkError.
 */

import * as fs from 'fs';
import * as https from 'https';
import * as http from 'http';
import { IOError, NetworkError, toError } from '../errors';

export const USER_AGENT = 'uisync/1.0';

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface RequestConfig {
  /** Request timeout in milliseconds */
  timeout: number;
  /** Extra request headers */
  headers?: Record<string, string>;
}

export interface DownloadProgress {
  total: number;
  downloaded: number;
  percentage: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

/**
 * Open a GET request and resolve with the first non-redirect response
 */
function openResponse(
  url: string,
  config: RequestConfig,
  redirectsLeft = MAX_REDIRECTS
): Promise<http.IncomingMessage> {
  return new Promise((resolve, reject) => {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      reject(new NetworkError(`Invalid URL: ${url}`, url));
      return;
    }

    const protocol = target.protocol === 'http:' ? http : https;
    const options: https.RequestOptions = {
      headers: { 'User-Agent': USER_AGENT, ...config.headers },
      agent: false, // no pooling, lets the process exit
    };

    const req = protocol.get(target, options, (res) => {
      const status = res.statusCode ?? 0;

      if (REDIRECT_STATUSES.has(status)) {
        res.resume();
        const location = res.headers.location;
        if (!location) {
          reject(new NetworkError('Redirect without location header', url));
          return;
        }
        if (redirectsLeft <= 0) {
          reject(new NetworkError('Too many redirects', url));
          return;
        }
        openResponse(new URL(location, target).toString(), config, redirectsLeft - 1).then(
          resolve,
          reject
        );
        return;
      }

      if (status !== 200) {
        res.resume();
        reject(
          new NetworkError(`HTTP ${status}: ${res.statusMessage ?? 'request failed'}`, url, {
            statusCode: status,
          })
        );
        return;
      }

      resolve(res);
    });

    req.on('error', (err) => {
      reject(new NetworkError(`Request failed: ${err.message}`, url, { cause: err }));
    });

    req.setTimeout(config.timeout, () => {
      req.destroy(new Error(`timeout (${config.timeout / 1000}s)`));
    });
  });
}

/**
 * Fetch and parse a JSON document
 */
export async function fetchJson(url: string, config: RequestConfig): Promise<unknown> {
  const res = await openResponse(url, {
    ...config,
    headers: { Accept: 'application/vnd.github+json', ...config.headers },
  });

  const data = await new Promise<string>((resolve, reject) => {
    let body = '';
    res.setEncoding('utf8');
    res.on('data', (chunk: string) => (body += chunk));
    res.on('end', () => resolve(body));
    res.on('error', (err) =>
      reject(new NetworkError(`Response failed: ${err.message}`, url, { cause: err }))
    );
  });

  try {
    return JSON.parse(data);
  } catch (error) {
    throw new NetworkError('Invalid JSON in response', url, { cause: error });
  }
}

/**
 * Stream a URL to a file. A partial file is removed on failure.
 */
export async function downloadFile(
  url: string,
  destPath: string,
  config: RequestConfig,
  onProgress?: ProgressCallback
): Promise<void> {
  const res = await openResponse(url, config);
  const totalBytes = parseInt(res.headers['content-length'] || '0', 10);
  let downloadedBytes = 0;

  await new Promise<void>((resolve, reject) => {
    let settled = false;
    const fileStream = fs.createWriteStream(destPath);

    const failWith = (error: Error) => {
      if (settled) return;
      settled = true;
      res.destroy();
      fileStream.destroy();
      fs.rm(destPath, { force: true }, () => reject(error));
    };

    res.on('data', (chunk: Buffer) => {
      downloadedBytes += chunk.length;
      if (onProgress && totalBytes > 0) {
        onProgress({
          total: totalBytes,
          downloaded: downloadedBytes,
          percentage: Math.round((downloadedBytes / totalBytes) * 100),
        });
      }
    });

    res.on('error', (err) =>
      failWith(new NetworkError(`Download interrupted: ${err.message}`, url, { cause: err }))
    );
    res.on('aborted', () => failWith(new NetworkError('Download aborted by server', url)));
    fileStream.on('error', (err) =>
      failWith(new IOError(`Cannot write ${destPath}: ${toError(err).message}`, destPath, { cause: err }))
    );
    fileStream.on('finish', () => {
      if (settled) return;
      settled = true;
      resolve();
    });

    res.pipe(fileStream);
  });
}
