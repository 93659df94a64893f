import { cleanup, fireEvent, render, screen } from '@testing-library/react'
import { afterEach, describe, expect, test, vi } from 'vitest'
import RecordingControls from '../RecordingControls'

describe('RecordingControls', () => {
  afterEach(() => {
    cleanup()
  })

  test('only allows starting while idle', () => {
    const onStart = vi.fn()
    render(<RecordingControls recording={false} busy={false} status="" onStart={onStart} onStop={vi.fn()} />)

    expect(screen.getByRole('button', { name: 'Stop' })).toBeDisabled()
    fireEvent.click(screen.getByRole('button', { name: 'Record' }))
    expect(onStart).toHaveBeenCalledTimes(1)
    expect(screen.queryByText('REC')).not.toBeInTheDocument()
  })

  test('only allows stopping while recording', () => {
    const onStop = vi.fn()
    render(<RecordingControls recording busy={false} status="Recording… writing to a.mp4" onStart={vi.fn()} onStop={onStop} />)

    expect(screen.getByRole('button', { name: 'Record' })).toBeDisabled()
    fireEvent.click(screen.getByRole('button', { name: 'Stop' }))
    expect(onStop).toHaveBeenCalledTimes(1)
    expect(screen.getByText('REC')).toBeInTheDocument()
    expect(screen.getByRole('status')).toHaveTextContent('Recording… writing to a.mp4')
  })

  test('disables both buttons while a command is running', () => {
    render(<RecordingControls recording={false} busy status="" onStart={vi.fn()} onStop={vi.fn()} />)

    expect(screen.getByRole('button', { name: 'Record' })).toBeDisabled()
    expect(screen.getByRole('button', { name: 'Stop' })).toBeDisabled()
  })
})
