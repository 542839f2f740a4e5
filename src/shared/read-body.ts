// src/shared/read-body.ts — Response body reads bounded by an AbortSignal

import { TextDecoder } from "node:util"

/**
 * Read the whole body as text. Rejects with `signal.reason` once the signal
 * aborts, even when the body stream itself never closes.
 */
export async function readBody(res: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) throw signal.reason
  if (!res.body) return ""

  const reader = res.body.getReader()
  const decoder = new TextDecoder()
  let onAbort = (): void => {}
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(signal.reason)
  })
  signal.addEventListener("abort", onAbort, { once: true })

  try {
    let text = ""
    for (;;) {
      const chunk = await Promise.race([reader.read(), aborted])
      if (chunk.done) return text + decoder.decode()
      text += decoder.decode(chunk.value, { stream: true })
    }
  } finally {
    signal.removeEventListener("abort", onAbort)
  }
}
