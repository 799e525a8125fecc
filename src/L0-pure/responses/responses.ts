import type { NormalizedText } from '../types/index.js'

// Client library versions disagree on response shapes: SDK objects, plain
// strings (response_format=text), raw JSON bodies, and the legacy completion
// mapping all show up. Everything is folded into NormalizedText here so the
// services never look at raw payloads.

const PREVIEW_LENGTH = 200

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function preview(value: unknown): string {
  let raw: string
  try {
    raw = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value)
  } catch {
    raw = String(value)
  }
  return raw.length > PREVIEW_LENGTH ? `${raw.slice(0, PREVIEW_LENGTH)}…` : raw
}

/** Parse a string that looks like a JSON object; other strings stay as they are. */
function maybeParseJson(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  if (!trimmed.startsWith('{')) return value
  try {
    return JSON.parse(trimmed) as unknown
  } catch {
    return value
  }
}

/** Speech-to-text: `{ text }` object, JSON body, or bare text. */
export function normalizeTranscriptionResponse(response: unknown): NormalizedText {
  const value = maybeParseJson(response)
  if (typeof value === 'string') {
    return { kind: 'text', text: value }
  }
  if (isRecord(value) && typeof value.text === 'string') {
    return { kind: 'text', text: value.text }
  }
  return { kind: 'unrecognized', preview: preview(response) }
}

/** Chat: `choices[0].message.content` (current) or `choices[0].text` (legacy completions). */
export function normalizeChatResponse(response: unknown): NormalizedText {
  const value = maybeParseJson(response)
  if (isRecord(value) && Array.isArray(value.choices) && value.choices.length > 0) {
    const first: unknown = value.choices[0]
    if (isRecord(first)) {
      if (isRecord(first.message) && typeof first.message.content === 'string') {
        return { kind: 'text', text: first.message.content }
      }
      if (typeof first.text === 'string') {
        return { kind: 'text', text: first.text }
      }
    }
  }
  return { kind: 'unrecognized', preview: preview(response) }
}
