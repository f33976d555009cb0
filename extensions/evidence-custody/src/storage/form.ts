import type { PutInput } from "./types.js";

/** multipart body with a single `file` part */
export function fileFormData(input: PutInput, fallbackName: string): FormData {
  const blob = new Blob([Uint8Array.from(input.bytes)], { type: input.contentType });
  const formData = new FormData();
  formData.append("file", blob, input.name ?? fallbackName);
  return formData;
}

/** fetch with a deadline; network failures and timeouts are rethrown with `label`. */
export async function postForm(
  url: string,
  init: { body: FormData; headers?: Record<string, string>; timeoutMs: number },
  label: string,
): Promise<Response> {
  try {
    return await fetch(url, {
      method: "POST",
      headers: init.headers,
      body: init.body,
      signal: AbortSignal.timeout(init.timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new Error(`${label} timed out after ${init.timeoutMs}ms`, { cause: err });
    }
    throw new Error(`${label} unreachable at ${new URL(url).origin}`, { cause: err });
  }
}
