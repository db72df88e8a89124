import { JSDOM } from 'jsdom';
import { SIMPLE_API_ACCEPT } from '../../constants/index.js';
import { PackageNotFoundError, IndexRequestError } from '../../utils/errors.js';
import { HttpClient } from '../../utils/http-client.js';
import { logger } from '../../utils/logger.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { sameVersion } from '../../utils/pep440.js';
import { isRecord, isStringArray, optionalString } from '../../utils/validation/guards.js';

export interface PackageHash {
  sha256: string;
}

/**
 * A package index as seen by the solver and the environment probe.
 */
export interface PackageSource {
  readonly url: string;
  /** All released versions; throws PackageNotFoundError for unknown projects */
  getPackageVersions(packageName: string): Promise<string[]>;
  getPackageHashes(packageName: string, version: string): Promise<PackageHash[]>;
}

export interface IndexFile {
  filename: string;
  version?: string;
  sha256?: string;
  yanked: boolean;
}

export interface ProjectPage {
  name: string;
  files: IndexFile[];
  versions: string[];
}

const SDIST_EXTENSIONS = ['.tar.gz', '.tar.bz2', '.tar.xz', '.tgz', '.zip', '.tar'];

/**
 * Derive the version a distribution file was built for.
 */
export function versionFromFilename(filename: string, packageName: string): string | undefined {
  if (filename.endsWith('.whl') || filename.endsWith('.egg')) {
    return filename.slice(0, -4).split('-')[1];
  }

  const extension = SDIST_EXTENSIONS.find((ext) => filename.toLowerCase().endsWith(ext));
  if (!extension) {
    return undefined;
  }

  // Project names may contain dashes, so match the name prefix instead of splitting
  const stem = filename.slice(0, -extension.length);
  const normalized = normalizePackageName(packageName);
  for (let i = stem.indexOf('-'); i >= 0; i = stem.indexOf('-', i + 1)) {
    if (normalizePackageName(stem.slice(0, i)) === normalized) {
      return stem.slice(i + 1) || undefined;
    }
  }

  const lastDash = stem.lastIndexOf('-');
  return lastDash > 0 ? stem.slice(lastDash + 1) : undefined;
}

/**
 * Parse a PEP 691 project page.
 */
export function parseProjectPage(body: unknown, packageName: string): ProjectPage {
  if (!isRecord(body) || !Array.isArray(body.files)) {
    throw new Error(`Unexpected project page format for '${packageName}'`);
  }

  const files: IndexFile[] = [];
  for (const item of body.files) {
    if (!isRecord(item)) continue;
    const filename = optionalString(item, 'filename');
    if (!filename) continue;

    const hashes: Record<string, unknown> = isRecord(item.hashes) ? item.hashes : {};
    files.push({
      filename,
      version: versionFromFilename(filename, packageName),
      sha256: optionalString(hashes, 'sha256'),
      yanked: item.yanked !== undefined && item.yanked !== false
    });
  }

  const versions = isStringArray(body.versions) ? body.versions : versionsOfFiles(files);
  return { name: optionalString(body, 'name') ?? packageName, files, versions };
}

function versionsOfFiles(files: readonly IndexFile[]): string[] {
  const versions: string[] = [];
  for (const file of files) {
    if (file.version && !versions.includes(file.version)) {
      versions.push(file.version);
    }
  }
  return versions;
}

// `#sha256=<digest>`, possibly among other hash fragments
function sha256FromHref(href: string): string | undefined {
  const hashStart = href.indexOf('#');
  if (hashStart < 0) {
    return undefined;
  }
  return new URLSearchParams(href.slice(hashStart + 1)).get('sha256') ?? undefined;
}

/**
 * Parse a PEP 503 HTML project page: one anchor per distribution file.
 */
export function parseHtmlProjectPage(html: string, packageName: string): ProjectPage {
  const { document } = new JSDOM(html).window;
  const files: IndexFile[] = [];

  for (const anchor of Array.from(document.querySelectorAll('a'))) {
    const href = anchor.getAttribute('href') ?? '';
    const filename = anchor.textContent?.trim() || href.split('#')[0].split('/').pop();
    if (!filename) continue;

    files.push({
      filename,
      version: versionFromFilename(filename, packageName),
      sha256: sha256FromHref(href),
      yanked: anchor.hasAttribute('data-yanked')
    });
  }

  return { name: packageName, files, versions: versionsOfFiles(files) };
}

export interface SimpleIndexOptions {
  http?: HttpClient;
}

/**
 * Client of a PEP 503/691 "simple" repository such as https://pypi.org/simple.
 * The JSON API is preferred; HTML pages are read when that is all the index
 * serves. Project pages are cached for the lifetime of the instance.
 */
export class SimpleIndex implements PackageSource {
  /** As configured; reported back unchanged in results */
  readonly url: string;
  private readonly baseUrl: string;
  private readonly http: HttpClient;
  private readonly pages = new Map<string, ProjectPage>();

  constructor(url: string, options: SimpleIndexOptions = {}) {
    this.url = url;
    this.baseUrl = url.replace(/\/+$/, '');
    this.http = options.http ?? new HttpClient();
  }

  async getProjectPage(packageName: string): Promise<ProjectPage> {
    const key = normalizePackageName(packageName);
    const cached = this.pages.get(key);
    if (cached) {
      return cached;
    }
    const page = await this.fetchProjectPage(key);
    this.pages.set(key, page);
    return page;
  }

  async getPackageVersions(packageName: string): Promise<string[]> {
    const page = await this.getProjectPage(packageName);
    return page.versions;
  }

  async getPackageHashes(packageName: string, version: string): Promise<PackageHash[]> {
    const page = await this.getProjectPage(packageName);
    const hashes: PackageHash[] = [];
    for (const file of page.files) {
      if (!file.sha256 || !file.version || !sameVersion(file.version, version)) continue;
      if (!hashes.some((hash) => hash.sha256 === file.sha256)) {
        hashes.push({ sha256: file.sha256 });
      }
    }
    return hashes;
  }

  private async fetchProjectPage(normalizedName: string): Promise<ProjectPage> {
    const url = `${this.baseUrl}/${normalizedName}/`;
    const response = await this.http.get(url, { Accept: SIMPLE_API_ACCEPT });

    if (response.status === 404) {
      throw new PackageNotFoundError(normalizedName, this.url);
    }

    let page: ProjectPage;
    if (response.contentType === 'text/html') {
      page = parseHtmlProjectPage(response.text, normalizedName);
    } else {
      let body: unknown;
      try {
        body = JSON.parse(response.text);
      } catch (error) {
        throw new IndexRequestError(url, response.status, `invalid JSON body: ${String(error)}`);
      }
      try {
        page = parseProjectPage(body, normalizedName);
      } catch (error) {
        throw new IndexRequestError(url, response.status, error instanceof Error ? error.message : String(error));
      }
    }

    logger.debug(`Index ${this.url} lists ${page.versions.length} versions of ${normalizedName}`);
    return page;
  }
}
