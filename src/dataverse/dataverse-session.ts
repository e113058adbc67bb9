// Dataverse Session — owns the access token and the Web API client
// Pure HTTP client. The record store and file sink use this for authenticated calls.

import axios, { type AxiosInstance, type AxiosResponse, isAxiosError } from 'axios';
import { HTTP_STATUS, WEB_API_PATH } from '../constants';
import { FatalConnectionError } from '../errors';
import Logger, { getErrorMessage } from '../logger';
import type { ConnectionSettings } from '../types';
import { validateCollection } from '../validators';
import type { DVTokenResponse, DVWhoAmIResponse, ODataCollection } from './dataverse-types';
import { isAuthError, isTransient, type RetryOptions, requestWithRetry } from './request-utils';

const LOGIN_HOST = 'https://login.microsoftonline.com';

export class DataverseSession {
  private accessToken: string | null = null;
  private client: AxiosInstance;
  private settings: ConnectionSettings;
  private retryOptions: RetryOptions;

  constructor(settings: ConnectionSettings, retryOptions: RetryOptions = {}) {
    this.settings = settings;
    this.retryOptions = retryOptions;
    this.client = axios.create({
      baseURL: new URL(WEB_API_PATH, settings.url).toString(),
      headers: {
        Accept: 'application/json',
        'OData-MaxVersion': '4.0',
        'OData-Version': '4.0',
        Prefer: 'odata.include-annotations="*"'
      }
    });
  }

  get isReady(): boolean {
    return this.accessToken !== null;
  }

  /**
   * Acquire a client-credentials token from the Microsoft identity platform.
   * Throttling and server errors from the token endpoint are retried.
   */
  private async requestToken(): Promise<string> {
    const scope = `${new URL(this.settings.url).origin}/.default`;
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.settings.clientId,
      client_secret: this.settings.clientSecret,
      scope
    });
    const tokenUrl = `${LOGIN_HOST}/${encodeURIComponent(this.settings.tenantId)}/oauth2/v2.0/token`;

    const response = await requestWithRetry(
      () => axios.post<DVTokenResponse>(tokenUrl, body.toString(), { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }),
      { ...this.retryOptions, logPrefix: 'Token request' }
    );

    const token = response.data?.access_token;
    if (!token) throw new Error('Token response did not contain an access token');
    this.accessToken = token;
    return token;
  }

  /**
   * Authenticate and verify the connection with WhoAmI.
   * This is the only call that raises FatalConnectionError.
   */
  async connect(): Promise<DVWhoAmIResponse> {
    Logger.info(`Dataverse session: connecting to ${this.settings.url}`);
    try {
      await this.requestToken();
    } catch (error) {
      if (isAxiosError(error) && error.response && !isTransient(error)) {
        Logger.error(`Dataverse session: token request rejected (HTTP ${error.response.status})`);
        throw new FatalConnectionError('Authentication failed. Please check credentials.', { cause: error });
      }
      throw new FatalConnectionError(`Token request failed: ${getErrorMessage(error)}`, { cause: error });
    }

    let whoAmI: DVWhoAmIResponse;
    try {
      const response = await this.client.get<DVWhoAmIResponse>('WhoAmI', { headers: this.authHeaders });
      whoAmI = response.data;
    } catch (error) {
      this.accessToken = null;
      throw new FatalConnectionError(`CRM connection failed: ${this.describeError(error, 'WhoAmI')}`, { cause: error });
    }

    Logger.info(`Dataverse session: connected (caller ${whoAmI.UserId})`);
    return whoAmI;
  }

  private get authHeaders(): Record<string, string> {
    if (!this.accessToken) throw new Error('Not authenticated. Must connect first.');
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  private describeError(error: unknown, label: string): string {
    if (isAxiosError(error) && error.response) {
      return `${label} failed: ${error.response.status} ${error.response.statusText}`;
    }
    return `${label} failed: ${getErrorMessage(error)}`;
  }

  /** Execute an authenticated request, re-acquiring the token once on 401/403 */
  private async authenticatedRequest<T>(requestFn: (headers: Record<string, string>) => Promise<AxiosResponse<T>>, label: string): Promise<AxiosResponse<T>> {
    if (!this.accessToken) throw new Error('Not authenticated. Must connect first.');
    const retry = { ...this.retryOptions, logPrefix: label };

    try {
      return await requestWithRetry(() => requestFn(this.authHeaders), retry);
    } catch (error) {
      if (!isAuthError(error)) throw new Error(this.describeError(error, label), { cause: error });
      Logger.warn(`${label}: token rejected, re-authenticating`);
      try {
        await this.requestToken();
      } catch (authError) {
        // keep the old token: the next request gets its own refresh attempt
        throw new Error(this.describeError(authError, `${label} re-authentication`), { cause: authError });
      }
      try {
        return await requestWithRetry(() => requestFn(this.authHeaders), retry);
      } catch (retryError) {
        throw new Error(this.describeError(retryError, label), { cause: retryError });
      }
    }
  }

  /** Authenticated GET; `url` is relative to the Web API root or an absolute nextLink */
  async apiGet<T>(url: string, label: string): Promise<T> {
    const response = await this.authenticatedRequest<T>((headers) => this.client.get<T>(url, { headers }), label);
    return response.data;
  }

  /** GET every page of a collection, following @odata.nextLink */
  async apiGetAll<T>(url: string, label: string): Promise<T[]> {
    const rows: T[] = [];
    let next: string | undefined = url;
    let page = 0;

    while (next) {
      const data: ODataCollection<T> = await this.apiGet<ODataCollection<T>>(next, `${label} (page ${page + 1})`);
      const validation = validateCollection(data);
      if (!validation.valid) throw new Error(`${label}: unexpected response shape (${validation.issues.join('; ')})`);
      rows.push(...data.value);
      next = data['@odata.nextLink'];
      page++;
    }

    return rows;
  }

  /** Authenticated PATCH returning the full response (headers are needed for file uploads) */
  async apiPatch(url: string, body: Buffer | null, label: string, extraHeaders: Record<string, string> = {}): Promise<AxiosResponse<unknown>> {
    const response = await this.authenticatedRequest<unknown>(
      (headers) => this.client.patch(url, body ?? undefined, { headers: { ...extraHeaders, ...headers }, maxBodyLength: Infinity }),
      label
    );
    if (response.status !== HTTP_STATUS.OK && response.status !== HTTP_STATUS.NO_CONTENT) {
      throw new Error(`${label} failed with status ${response.status}`);
    }
    return response;
  }
}
