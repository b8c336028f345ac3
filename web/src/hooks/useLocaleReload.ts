import { useEffect } from 'react'
import { io, Socket } from 'socket.io-client'
import i18n from '../i18n'

type ChangedPayload = { topic?: string; languages?: string[] }

// The API broadcasts `changed { topic: 'locales' }` after POST /api/i18n/reload.
export default function useLocaleReload() {
  useEffect(() => {
    const sock: Socket = io({ path: '/socket.io', transports: ['websocket', 'polling'], reconnection: true })
    const onChanged = (p: ChangedPayload) => {
      if (p?.topic !== 'locales') return
      i18n.reloadResources().catch((err) => {
        // eslint-disable-next-line no-console
        console.warn('reloading translations failed', err)
      })
    }
    sock.on('changed', onChanged)
    return () => {
      sock.off('changed', onChanged)
      sock.disconnect()
    }
  }, [])
}
