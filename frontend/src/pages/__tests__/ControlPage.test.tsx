import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import type { SessionSnapshot } from '../../types/session.types'
import ControlPage from '../ControlPage'

const { sessionApi, socket } = vi.hoisted(() => ({
  sessionApi: {
    getStatus: vi.fn(),
    toggleCamera: vi.fn(),
    selectCamera: vi.fn(),
    startRecording: vi.fn(),
    stopRecording: vi.fn(),
    setStreamEnabled: vi.fn(),
  },
  socket: {
    on: vi.fn(),
    off: vi.fn(),
  },
}))

vi.mock('../../services/backend-api.service', () => ({
  sessionApi,
  streamUrl: () => '/stream',
}))

vi.mock('../../services/socket.service', () => ({
  socketClient: { connect: () => socket },
}))

const IDLE: SessionSnapshot = {
  labels: ['wide', 'narrow'],
  active: 'wide',
  recording: false,
  file: null,
  recordingLabel: null,
  streamEnabled: true,
  camerasRunning: true,
}

const FILE = '/output/videos/2026-10-18/narrow_20261018_210509.mp4'

const streamT = () => {
  const src = screen.getByAltText('Live camera stream').getAttribute('src') ?? ''
  return new URL(src).searchParams.get('t')
}

describe('ControlPage', () => {
  beforeEach(() => {
    Object.values(sessionApi).forEach((mock) => mock.mockReset())
    socket.on.mockReset()
    socket.off.mockReset()
    sessionApi.getStatus.mockResolvedValue(IDLE)
  })

  afterEach(() => {
    cleanup()
    vi.useRealTimers()
  })

  test('shows the active camera once the status has loaded', async () => {
    render(<ControlPage />)

    expect(await screen.findByTestId('active-label')).toHaveTextContent('wide')
    expect(screen.getByRole('combobox')).toHaveValue('wide')
    expect(socket.on).toHaveBeenCalledWith('session:updated', expect.any(Function))
  })

  test('switching camera updates the label and refreshes the stream URL', async () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(1000)
    sessionApi.toggleCamera.mockResolvedValue({ active: 'narrow' })
    render(<ControlPage />)
    await screen.findByTestId('active-label')
    const before = streamT()

    vi.setSystemTime(2000)
    fireEvent.click(screen.getByRole('button', { name: 'Switch camera' }))

    await waitFor(() => expect(screen.getByTestId('active-label')).toHaveTextContent('narrow'))
    expect(screen.getByRole('combobox')).toHaveValue('narrow')
    expect(before).toBe('1000')
    expect(streamT()).toBe('2000')
  })

  test('selecting a camera posts the label', async () => {
    sessionApi.selectCamera.mockResolvedValue({ active: 'narrow' })
    render(<ControlPage />)
    await screen.findByTestId('active-label')

    fireEvent.change(screen.getByRole('combobox'), { target: { value: 'narrow' } })

    await waitFor(() => expect(screen.getByTestId('active-label')).toHaveTextContent('narrow'))
    expect(sessionApi.selectCamera).toHaveBeenCalledWith('narrow')
  })

  test('record and stop report the file', async () => {
    sessionApi.startRecording.mockResolvedValue({ status: 'recording', file: FILE })
    sessionApi.stopRecording.mockResolvedValue({ status: 'stopped', file: FILE })
    render(<ControlPage />)
    await screen.findByTestId('active-label')

    fireEvent.click(screen.getByRole('button', { name: 'Record' }))
    await waitFor(() => expect(screen.getByRole('status')).toHaveTextContent(`Recording… writing to ${FILE}`))
    expect(screen.getByRole('button', { name: 'Record' })).toBeDisabled()

    fireEvent.click(screen.getByRole('button', { name: 'Stop' }))
    await waitFor(() => expect(screen.getByRole('status')).toHaveTextContent(`Stopped. Saved: ${FILE}`))
    expect(screen.getByRole('button', { name: 'Stop' })).toBeDisabled()
  })

  test('shows the server error when a command fails', async () => {
    sessionApi.startRecording.mockRejectedValue(new Error('Camera "wide" is unavailable: camera is not running'))
    render(<ControlPage />)
    await screen.findByTestId('active-label')

    fireEvent.click(screen.getByRole('button', { name: 'Record' }))

    expect(await screen.findByRole('alert')).toHaveTextContent('Camera "wide" is unavailable: camera is not running')
  })

  test('follows updates pushed over the socket', async () => {
    render(<ControlPage />)
    await screen.findByTestId('active-label')
    const handler = socket.on.mock.calls.find(([event]) => event === 'session:updated')?.[1]

    handler?.({ ...IDLE, active: 'narrow', recording: true, file: FILE, recordingLabel: 'narrow' })

    await waitFor(() => expect(screen.getByTestId('active-label')).toHaveTextContent('narrow'))
    expect(screen.getByText('REC')).toBeInTheDocument()
  })
})
