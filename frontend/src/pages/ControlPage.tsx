import CameraSelector from '../components/CameraSelector'
import RecordingControls from '../components/RecordingControls'
import StreamView from '../components/StreamView'
import { useSession } from '../hooks/useSession'

function ControlPage() {
  const {
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
  } = useSession()

  if (!session) {
    return (
      <div className="flex items-center justify-center min-h-screen bg-gray-900 text-gray-300">
        {error ? `Backend unavailable: ${error}` : 'Connecting…'}
      </div>
    )
  }

  return (
    <div className="min-h-screen bg-gradient-to-br from-gray-900 via-gray-800 to-gray-900 p-6">
      <div className="max-w-4xl mx-auto flex flex-col gap-6">
        <h1 className="text-white text-2xl font-bold">Dual Camera Recorder</h1>

        <StreamView
          src={streamSrc}
          enabled={session.streamEnabled}
          onToggle={(enable) => void setStreamEnabled(enable)}
        />

        <CameraSelector
          labels={session.labels}
          active={session.active}
          disabled={busy}
          onSelect={(label) => void selectCamera(label)}
          onToggle={() => void toggleCamera()}
        />

        <RecordingControls
          recording={session.recording}
          busy={busy}
          status={status}
          onStart={() => void startRecording()}
          onStop={() => void stopRecording()}
        />

        {error && (
          <div role="alert" className="bg-red-500/10 border border-red-500 rounded-lg p-3 text-red-300 text-sm">
            {error}
          </div>
        )}

        {!session.camerasRunning && (
          <p className="text-yellow-400 text-sm">Cameras are off.</p>
        )}
      </div>
    </div>
  )
}

export default ControlPage
