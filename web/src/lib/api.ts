import { LANG_PARAM } from '../i18nOptions'

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export function greetingUrl(lang: string) {
  return `/api/greeting?${LANG_PARAM}=${encodeURIComponent(lang)}`
}

export async function fetchGreeting(lang: string, fetchImpl: FetchLike = fetch): Promise<string> {
  const res = await fetchImpl(greetingUrl(lang), { headers: { Accept: 'application/json' } })
  if (!res.ok) throw new Error(`greeting request failed with ${res.status}`)
  const body: unknown = await res.json()
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message
  }
  throw new Error('greeting response has no message')
}

export function languageName(code: string, displayIn: string) {
  try {
    const names = new Intl.DisplayNames([displayIn], { type: 'language' })
    return names.of(code) ?? code
  } catch {
    return code
  }
}
