/**
 * HikerAPI Transport
 *
 * Thin GET wrapper shared by the collectors.
 *
 * HikerAPI Reference:
 * - Base URL: https://api.hikerapi.com
 * - Auth: x-access-key header
 *
 * Calls are made once; there is no retry. Failures come back as a result
 * value so collectors can log them and carry on with empty data.
 */

import axios from 'axios';
import type { ApiCredentials } from '../types/index.js';
import { HIKER_API, API_REQUEST_TIMEOUT_MS } from '../types/index.js';
import { logVerbose } from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Result of a single API call
 */
export type ApiCallResult<T> =
  | { success: true; data: T }
  | { success: false; error: Error };

/**
 * Query parameters; undefined values are left out of the URL by axios
 */
export type QueryParams = Record<string, string | number | undefined>;

// ============================================
// Helper Functions
// ============================================

/**
 * Build headers for HikerAPI requests
 */
function buildHeaders(credentials: ApiCredentials): Record<string, string> {
  return {
    'x-access-key': credentials.token,
    Accept: 'application/json',
  };
}

/**
 * Read the HTTP status from an axios-style error, if it carries one.
 */
function responseStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return undefined;
  }
  return typeof response.status === 'number' ? response.status : undefined;
}

/**
 * Convert a thrown value into an Error, keeping the HTTP status in the message.
 */
export function toApiError(error: unknown): Error {
  const base = error instanceof Error ? error : new Error(String(error));
  const status = responseStatus(error);
  if (status !== undefined && !base.message.includes(String(status))) {
    base.message = `${base.message} (HTTP ${status})`;
  }
  return base;
}

// ============================================
// Main Export
// ============================================

/**
 * GET a HikerAPI endpoint.
 *
 * @param path - Endpoint path (see HIKER_API)
 * @param params - Query parameters
 * @param credentials - API token
 * @returns Parsed JSON body, or the error that prevented it
 */
export async function hikerGet(
  path: string,
  params: QueryParams,
  credentials: ApiCredentials
): Promise<ApiCallResult<unknown>> {
  const url = `${HIKER_API.baseUrl}${path}`;
  logVerbose(`GET ${path} ${JSON.stringify(params)}`);

  try {
    const response = await axios.get<unknown>(url, {
      params,
      headers: buildHeaders(credentials),
      timeout: API_REQUEST_TIMEOUT_MS,
    });
    return { success: true, data: response.data };
  } catch (error) {
    return { success: false, error: toApiError(error) };
  }
}
