import { EventEmitter } from 'node:events'

export type ChangeTopic = 'locales'

export type ChangePayload = { topic: ChangeTopic; ts: number; languages?: string[] }

const ev = new EventEmitter()

export function emitChange(topic: ChangeTopic, extra: { languages?: string[] } = {}) {
  ev.emit('change', { topic, ts: Date.now(), ...extra })
}

export function onChange(handler: (p: ChangePayload) => void) {
  ev.on('change', handler)
  return () => {
    ev.off('change', handler)
  }
}
