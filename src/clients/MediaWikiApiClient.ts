/**
 * MediaWikiApiClient - Client for the MediaWiki Action API of a Wikibase site
 *
 * Handles the cookie session, login/csrf tokens, entity reads
 * (wbgetentities) and statement writes (wbeditentity). Writes are retried
 * while the replicas lag (maxlag) and after the session expires.
 *
 * @see https://www.mediawiki.org/wiki/API:Main_page
 * @see https://www.mediawiki.org/wiki/Manual:Maxlag_parameter
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { z } from 'zod';
import { validateEnv } from '../config/env.js';
import type { EntityLookup } from '../services/rdf-patch/EntityLookup.js';
import { MAX_IDS_PER_LOOKUP } from '../services/rdf-patch/EntityLookup.js';
import type { EntityEditor } from '../services/rdf-patch/EditSubmitter.js';
import type { EntityEdit } from '../services/rdf-patch/changeDetector.js';
import {
  ConfigurationError,
  EditRetriesExhaustedError,
  LoginError,
  MediaWikiApiError,
} from '../types/errors.js';
import type { Entity, MissingEntity } from '../types/wikibase.js';
import { createChildLogger, type Logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';
import {
  ApiEnvelopeSchema,
  ExtractsResponseSchema,
  LoginResponseSchema,
  TokensResponseSchema,
  WbEditEntityResponseSchema,
  WbGetEntitiesResponseSchema,
} from '../validation/mediaWikiSchemas.js';

type HttpMethod = 'GET' | 'POST';
type TokenType = 'login' | 'csrf';

/** API error codes after which an edit is attempted again */
const RETRYABLE_EDIT_CODES = new Set(['maxlag', 'assertbotfailed', 'unsuccessful']);

/**
 * MediaWiki API client configuration
 */
export interface MediaWikiApiClientConfig {
  apiUrl?: string;
  userAgent?: string;
  maxlag?: number;
  /** Total wbeditentity attempts */
  editRetries?: number;
  /** Wait after a maxlag error */
  maxlagDelayMs?: number;
  timeoutMs?: number;
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function isRetryableEditError(error: unknown): error is MediaWikiApiError {
  return error instanceof MediaWikiApiError && RETRYABLE_EDIT_CODES.has(error.apiCode);
}

/**
 * MediaWikiApiClient - session-holding API client
 */
export class MediaWikiApiClient implements EntityLookup, EntityEditor {
  private readonly client: AxiosInstance;
  private readonly config: Required<Omit<MediaWikiApiClientConfig, 'adapter' | 'sleep' | 'logger'>>;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly cookies = new Map<string, string>();
  private credentials?: { username: string; password: string };
  private csrfToken = '';

  constructor(config: MediaWikiApiClientConfig = {}) {
    const env = validateEnv();

    this.config = {
      apiUrl: config.apiUrl ?? env.WIKIBASE_API_URL,
      userAgent: config.userAgent ?? env.WIKIBASE_USER_AGENT,
      maxlag: config.maxlag ?? env.WIKIBASE_MAXLAG,
      editRetries: config.editRetries ?? env.WIKIBASE_EDIT_RETRIES,
      maxlagDelayMs: config.maxlagDelayMs ?? env.WIKIBASE_MAXLAG_DELAY_MS,
      timeoutMs: config.timeoutMs ?? env.WIKIBASE_REQUEST_TIMEOUT_MS,
    };
    this.sleep = config.sleep;
    this.logger = config.logger ?? createChildLogger({ component: 'mediawiki-api' });

    this.client = axios.create({
      timeout: this.config.timeoutMs,
      headers: {
        'User-Agent': this.config.userAgent,
        Accept: 'application/json',
      },
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  get isLoggedIn(): boolean {
    return this.csrfToken !== '';
  }

  /**
   * Perform one API request and unwrap the error/warnings envelope
   *
   * @throws {MediaWikiApiError} When the response carries an `error` object
   */
  private async request(action: string, method: HttpMethod, params: Record<string, string> = {}): Promise<unknown> {
    const allParams: Record<string, string> = {
      ...params,
      action,
      format: 'json',
      maxlag: String(this.config.maxlag),
    };

    const headers: Record<string, string> = {};
    if (this.cookies.size > 0) {
      headers.Cookie = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
    }

    const response =
      method === 'GET'
        ? await this.client.get<unknown>(this.config.apiUrl, { params: allParams, headers })
        : await this.client.post<unknown>(this.config.apiUrl, new URLSearchParams(allParams).toString(), {
            headers: { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' },
          });

    const setCookie: unknown = response.headers['set-cookie'];
    this.storeCookies(Array.isArray(setCookie) ? setCookie.filter((v): v is string => typeof v === 'string') : []);

    const envelope = ApiEnvelopeSchema.parse(response.data);
    if (envelope.error) {
      this.logger.error({ action, code: envelope.error.code }, envelope.error.info);
      throw new MediaWikiApiError(envelope.error.code, envelope.error.info);
    }

    for (const warning of Object.values(envelope.warnings?.[action] ?? {})) {
      this.logger.warn({ action }, `[${action}] ${String(warning)}`);
    }

    return response.data;
  }

  private async requestParsed<T extends z.ZodTypeAny>(
    schema: T,
    action: string,
    method: HttpMethod,
    params?: Record<string, string>
  ): Promise<z.output<T>> {
    return schema.parse(await this.request(action, method, params));
  }

  private storeCookies(setCookie: string[]): void {
    for (const header of setCookie) {
      const [pair] = header.split(';');
      const separator = pair.indexOf('=');
      if (separator > 0) {
        this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
      }
    }
  }

  private async token(type: TokenType): Promise<string> {
    const response = await this.requestParsed(TokensResponseSchema, 'query', 'GET', { meta: 'tokens', type });
    const token = type === 'login' ? response.query.tokens.logintoken : response.query.tokens.csrftoken;
    if (!token) {
      throw new MediaWikiApiError('notoken', `No ${type} token in response`);
    }
    return token;
  }

  private async authenticate(): Promise<void> {
    if (!this.credentials) {
      throw new LoginError('no credentials');
    }
    const { username, password } = this.credentials;

    const loginToken = await this.token('login');
    const response = await this.requestParsed(LoginResponseSchema, 'login', 'POST', {
      lgname: username,
      lgpassword: password,
      lgtoken: loginToken,
    });

    if (response.login.result !== 'Success') {
      throw new LoginError(response.login.reason ?? response.login.result);
    }

    this.csrfToken = await this.token('csrf');
    this.logger.info({ username: response.login.lgusername ?? username }, 'Logged in');
  }

  /**
   * Log in with a bot password and fetch a csrf token
   * @throws {LoginError} When the API rejects the credentials
   */
  async login(username: string, password: string): Promise<void> {
    this.credentials = { username, password };
    await this.authenticate();
  }

  async logout(): Promise<void> {
    if (!this.isLoggedIn) {
      return;
    }
    await this.request('logout', 'POST', { token: this.csrfToken });
    this.csrfToken = '';
    this.cookies.clear();
    this.logger.debug('Logged out');
  }

  /**
   * Fetch entities by id (wbgetentities)
   */
  async getEntities(ids: string[]): Promise<Map<string, Entity | MissingEntity>> {
    if (ids.length === 0 || ids.length > MAX_IDS_PER_LOOKUP) {
      throw new RangeError(`Expected 1 to ${MAX_IDS_PER_LOOKUP} ids, got ${ids.length}`);
    }

    const response = await this.requestParsed(WbGetEntitiesResponseSchema, 'wbgetentities', 'GET', {
      ids: ids.join('|'),
      props: 'info|claims|datatype',
    });
    if (response.success !== 1) {
      throw new MediaWikiApiError('unsuccessful', 'wbgetentities did not report success');
    }

    this.logger.debug({ count: ids.length }, 'Fetched entities');
    return new Map(Object.entries(response.entities));
  }

  /**
   * Write changed statements of one entity (wbeditentity)
   *
   * @throws {EditRetriesExhaustedError} When every attempt hit maxlag or an expired session
   */
  async editEntity(edit: EntityEdit): Promise<void> {
    const { entityId, statements, baseRevisionId, summary } = edit;
    const data = JSON.stringify({ claims: statements });

    const attempt = async (): Promise<void> => {
      const params: Record<string, string> = {
        id: entityId,
        token: this.csrfToken,
        bot: '1',
        assert: 'bot',
        data,
      };
      if (baseRevisionId > 0) {
        params.baserevid = String(baseRevisionId);
      }
      if (summary) {
        params.summary = summary;
      }

      const response = await this.requestParsed(WbEditEntityResponseSchema, 'wbeditentity', 'POST', params);
      if (response.success !== 1) {
        throw new MediaWikiApiError('unsuccessful', 'wbeditentity did not report success');
      }
    };

    try {
      await retryWithBackoff(
        attempt,
        {
          maxAttempts: this.config.editRetries - 1,
          isRetryable: isRetryableEditError,
          getDelay: (_attempt, error) =>
            isRetryableEditError(error) && error.apiCode === 'maxlag' ? this.config.maxlagDelayMs : 0,
          onRetry: async (_attempt, error) => {
            if (isRetryableEditError(error) && error.apiCode === 'assertbotfailed') {
              this.logger.warn({ entityId }, 'Session expired, logging in again');
              await this.authenticate();
            }
          },
          sleep: this.sleep,
        },
        `wbeditentity ${entityId}`
      );
    } catch (error) {
      if (isRetryableEditError(error)) {
        throw new EditRetriesExhaustedError(entityId, this.config.editRetries);
      }
      throw error;
    }
  }

  /**
   * Item ids mentioned in the plain-text extract of a wiki page
   */
  async fetchPageEntityIds(title: string): Promise<Set<string>> {
    if (!title) {
      return new Set();
    }
    if (title.startsWith('http')) {
      throw new ConfigurationError(`Expected page title, not URL: ${title}`);
    }

    const response = await this.requestParsed(ExtractsResponseSchema, 'query', 'GET', {
      titles: title,
      prop: 'extracts',
      explaintext: '1',
    });

    const pages = Object.values(response.query.pages);
    if (pages.length !== 1) {
      throw new MediaWikiApiError('unexpectedpages', `Expected one page, got ${pages.length}`);
    }
    return new Set(pages[0].extract?.match(/Q[0-9]+/g) ?? []);
  }
}
