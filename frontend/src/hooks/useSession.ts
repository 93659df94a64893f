import { useCallback, useEffect, useState } from 'react'
import { sessionApi, streamUrl } from '../services/backend-api.service'
import { socketClient } from '../services/socket.service'
import type { SessionSnapshot } from '../types/session.types'
import { withCacheBuster } from '../utils/stream-url'

export interface SessionControls {
  session: SessionSnapshot | null
  streamSrc: string
  status: string
  error: string | null
  busy: boolean
  toggleCamera: () => Promise<void>
  selectCamera: (label: string) => Promise<void>
  startRecording: () => Promise<void>
  stopRecording: () => Promise<void>
  setStreamEnabled: (enable: boolean) => Promise<void>
}

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export function useSession(): SessionControls {
  const [session, setSession] = useState<SessionSnapshot | null>(null)
  const [streamSrc, setStreamSrc] = useState(() => withCacheBuster(streamUrl()))
  const [status, setStatus] = useState('')
  const [error, setError] = useState<string | null>(null)
  const [busy, setBusy] = useState(false)

  // Initial state, then follow every change pushed by the server
  useEffect(() => {
    let cancelled = false

    sessionApi.getStatus()
      .then((snapshot) => {
        if (!cancelled) setSession(snapshot)
      })
      .catch((err: unknown) => {
        console.error('Error loading session status:', err)
        if (!cancelled) setError(messageOf(err))
      })

    const socket = socketClient.connect()
    const handleUpdate = (snapshot: SessionSnapshot) => setSession(snapshot)
    socket.on('session:updated', handleUpdate)

    return () => {
      cancelled = true
      socket.off('session:updated', handleUpdate)
    }
  }, [])

  // Reconnect the MJPEG stream whenever the active camera changes
  const active = session?.active
  useEffect(() => {
    if (active) {
      setStreamSrc((src) => withCacheBuster(src))
    }
  }, [active])

  const run = useCallback(async (action: () => Promise<void>) => {
    setBusy(true)
    setError(null)
    try {
      await action()
    } catch (err) {
      console.error('Session command failed:', err)
      setError(messageOf(err))
    } finally {
      setBusy(false)
    }
  }, [])

  const applyActive = (label: string) =>
    setSession((current) => (current ? { ...current, active: label } : current))

  const toggleCamera = () => run(async () => {
    const response = await sessionApi.toggleCamera()
    applyActive(response.active)
  })

  const selectCamera = (label: string) => run(async () => {
    const response = await sessionApi.selectCamera(label)
    applyActive(response.active)
  })

  const startRecording = () => run(async () => {
    const { file } = await sessionApi.startRecording()
    setSession((current) => (current ? { ...current, recording: true, file } : current))
    setStatus(`Recording… writing to ${file}`)
  })

  const stopRecording = () => run(async () => {
    const { file } = await sessionApi.stopRecording()
    setSession((current) => (current ? { ...current, recording: false, file: null, recordingLabel: null } : current))
    setStatus(`Stopped. Saved: ${file}`)
  })

  const setStreamEnabled = (enable: boolean) => run(async () => {
    const { stream_enabled } = await sessionApi.setStreamEnabled(enable)
    setSession((current) => (current ? { ...current, streamEnabled: stream_enabled } : current))
  })

  return {
    session,
    streamSrc,
    status,
    error,
    busy,
    toggleCamera,
    selectCamera,
    startRecording,
    stopRecording,
    setStreamEnabled,
  }
}
