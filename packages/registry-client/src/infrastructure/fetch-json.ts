import type { FetchFunction } from "../domain/types.js";

/** `status` is 0 when no usable HTTP response arrived (transport failure or a non-JSON body). */
export type JsonResponse =
  | { ok: true; data: unknown }
  | { ok: false; status: number; reason: string };

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// Single attempt: callers decide what a failure means.
export const fetchJson = async (
  fetchImpl: FetchFunction,
  url: string,
  headers: Readonly<Record<string, string>> = {},
): Promise<JsonResponse> => {
  let response: Response;
  try {
    response = await fetchImpl(url, { headers: { ...headers } });
  } catch (error) {
    return { ok: false, status: 0, reason: errorMessage(error) };
  }

  if (response.status !== 200) {
    return { ok: false, status: response.status, reason: `HTTP ${response.status}` };
  }

  try {
    const data: unknown = await response.json();
    return { ok: true, data };
  } catch (error) {
    return { ok: false, status: 0, reason: `invalid JSON body: ${errorMessage(error)}` };
  }
};
