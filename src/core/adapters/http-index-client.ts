/**
 * Default RemoteIndexClient
 *
 * Talks to the package index over HTTP:
 *   GET {base}/api/packages          -> { packages: [{ name, latestVersion }] }
 *   GET {base}/api/packages/{name}   -> { name, latestVersion }
 *   {base}/download/{name}-{version}.tar.gz
 */

import { request, type Dispatcher } from 'undici';
import type { RemoteIndexClient } from '../ports/collaborators.js';
import { FetchError, PackageNotFoundError, getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isValidVersion } from '../../utils/version.js';
import { isMapping } from '../../utils/validation/mapping.js';

const INDEX_LOCATION = 'found in the package index';

export class HttpIndexClient implements RemoteIndexClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async latestVersion(name: string): Promise<string> {
    const body = await this.getJson(`${this.baseUrl}/api/packages/${encodeURIComponent(name)}`, name);
    if (!isMapping(body) || typeof body.latestVersion !== 'string' || !isValidVersion(body.latestVersion)) {
      throw new FetchError(name, 'package index returned a malformed entry');
    }
    return body.latestVersion;
  }

  downloadUrl(name: string, version: string): string {
    return `${this.baseUrl}/download/${encodeURIComponent(name)}-${encodeURIComponent(version)}.tar.gz`;
  }

  async listPackages(): Promise<string[]> {
    const body = await this.getJson(`${this.baseUrl}/api/packages`);
    if (!isMapping(body) || !Array.isArray(body.packages)) {
      throw new FetchError(this.baseUrl, 'package index returned a malformed listing');
    }
    const names: string[] = [];
    for (const entry of body.packages) {
      if (isMapping(entry) && typeof entry.name === 'string') {
        names.push(entry.name);
      }
    }
    return names.sort();
  }

  private async getJson(url: string, packageName?: string): Promise<unknown> {
    logger.debug(`GET ${url}`);
    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, { headers: { accept: 'application/json' } });
    } catch (error) {
      throw new FetchError(url, getErrorMessage(error));
    }

    if (response.statusCode === 404 && packageName) {
      await response.body.dump();
      throw new PackageNotFoundError(packageName, { location: INDEX_LOCATION });
    }
    if (response.statusCode >= 400) {
      await response.body.dump();
      throw new FetchError(url, `server responded with status ${response.statusCode}`);
    }

    try {
      return await response.body.json();
    } catch (error) {
      throw new FetchError(url, `invalid JSON response (${getErrorMessage(error)})`);
    }
  }
}
