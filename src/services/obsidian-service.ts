/**
 * Obsidian Service
 * Reads and updates an Obsidian vault stored in a GitHub repository
 */

import { HttpClient, isRecord } from '../core/http-client.js';
import { ErrorCategory, ToolError } from '../core/error-handler.js';
import { TimeUtils } from '../utils/time-utils.js';
import type { GitHubVaultConfig } from '../core/config.js';
import type { GitHubFileContent, VaultNote } from '../types/integrations.types.js';

export const MAX_SEARCH_RESULTS = 15;

export interface AppendTodoResult {
  path: string;
  date: string;
  commitSha?: string;
}

/**
 * Vault-relative note path with a .md extension; rejects traversal
 */
export function normalizeNotePath(filename: string): string {
  const segments = filename.trim().replace(/\\/g, '/').split('/').filter(segment => segment !== '');
  if (segments.length === 0) {
    throw new ToolError(ErrorCategory.VALIDATION, 'Note filename must not be empty');
  }
  if (segments.some(segment => segment === '..' || segment === '.')) {
    throw new ToolError(ErrorCategory.VALIDATION, `Invalid note path "${filename}": relative segments are not allowed`);
  }

  const path = segments.join('/');
  return path.endsWith('.md') ? path : `${path}.md`;
}

function toFileContent(json: unknown): GitHubFileContent | null {
  if (!isRecord(json) || typeof json.path !== 'string' || typeof json.sha !== 'string') {
    return null;
  }

  const file: GitHubFileContent = { path: json.path, sha: json.sha };
  if (typeof json.content === 'string') file.content = json.content;
  if (typeof json.encoding === 'string') file.encoding = json.encoding;
  return file;
}

export class ObsidianService {
  private readonly http: HttpClient;

  constructor(private readonly config: GitHubVaultConfig) {
    this.http = new HttpClient({
      serviceName: 'GitHub',
      baseUrl: config.apiUrl,
      timeoutMs: config.timeoutMs,
      headers: {
        'Authorization': `Bearer ${config.token}`,
        'Accept': 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
      },
    });
  }

  /**
   * Paths of markdown files whose text matches the query
   */
  async searchNotes(query: string): Promise<string[]> {
    const path = '/search/code';
    const response = await this.http.send(path, {
      query: { q: `${query} repo:${this.config.repo} extension:md` },
    });

    if (response.status === 403) {
      throw new ToolError(
        ErrorCategory.RATE_LIMIT,
        'GitHub API rate limit exceeded or invalid token permissions',
        { path, status: 403 }
      );
    }
    await this.http.assertOk(response, path);

    const json = await this.http.readJson(response, path);
    const items = isRecord(json) && Array.isArray(json.items) ? json.items : [];

    return items
      .filter(isRecord)
      .map(item => item.path)
      .filter((itemPath): itemPath is string => typeof itemPath === 'string')
      .slice(0, MAX_SEARCH_RESULTS);
  }

  async readNote(filename: string): Promise<VaultNote> {
    const notePath = normalizeNotePath(filename);
    const file = await this.getFile(notePath);
    if (!file) {
      throw new ToolError(ErrorCategory.DATA, `Note '${notePath}' not found in repository`, { path: notePath });
    }
    return { path: notePath, sha: file.sha, content: this.decodeContent(file) };
  }

  async getDailyNote(date: string = TimeUtils.getCurrentDate()): Promise<VaultNote> {
    return this.readNote(this.dailyNotePath(date));
  }

  /**
   * Append an unchecked task to an existing daily note
   */
  async appendTodo(text: string, date: string = TimeUtils.getCurrentDate()): Promise<AppendTodoResult> {
    const notePath = this.dailyNotePath(date);
    const file = await this.getFile(notePath);
    if (!file) {
      throw new ToolError(
        ErrorCategory.DATA,
        `Daily note ${notePath} does not exist. Please create it in the vault first.`,
        { path: notePath }
      );
    }

    const updated = `${this.decodeContent(file)}\n- [ ] ${text}`;
    const json = await this.http.putJson(this.contentsPath(notePath), {
      message: `Add todo via AI: ${text}`,
      content: Buffer.from(updated, 'utf-8').toString('base64'),
      sha: file.sha,
    });

    const result: AppendTodoResult = { path: notePath, date };
    const commit = isRecord(json) ? json.commit : undefined;
    if (isRecord(commit) && typeof commit.sha === 'string') {
      result.commitSha = commit.sha;
    }
    return result;
  }

  dailyNotePath(date: string): string {
    const dir = this.config.dailyNotesDir;
    return normalizeNotePath(dir ? `${dir}/${date}.md` : `${date}.md`);
  }

  /**
   * File metadata and content, or null when the file does not exist
   */
  private async getFile(notePath: string): Promise<GitHubFileContent | null> {
    const path = this.contentsPath(notePath);
    const response = await this.http.send(path);
    if (response.status === 404) return null;
    await this.http.assertOk(response, path);

    const file = toFileContent(await this.http.readJson(response, path));
    if (!file) {
      throw new ToolError(ErrorCategory.DATA, `'${notePath}' is not a file`, { path: notePath });
    }
    return file;
  }

  private decodeContent(file: GitHubFileContent): string {
    if (file.content === undefined || (file.encoding !== undefined && file.encoding !== 'base64')) {
      throw new ToolError(
        ErrorCategory.DATA,
        `Content of '${file.path}' is not available directly (file too large?)`,
        { path: file.path }
      );
    }
    return Buffer.from(file.content, 'base64').toString('utf-8');
  }

  private contentsPath(notePath: string): string {
    const encoded = notePath.split('/').map(encodeURIComponent).join('/');
    return `/repos/${this.config.repo}/contents/${encoded}`;
  }
}
