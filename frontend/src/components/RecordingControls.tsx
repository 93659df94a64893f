interface RecordingControlsProps {
  recording: boolean;
  busy: boolean;
  status: string;
  onStart: () => void;
  onStop: () => void;
}

function RecordingControls({ recording, busy, status, onStart, onStop }: RecordingControlsProps) {
  return (
    <div className="flex flex-col gap-2">
      <div className="flex gap-3">
        <button
          onClick={onStart}
          disabled={recording || busy}
          className="px-4 py-2 rounded-lg bg-red-600 hover:bg-red-700 text-white font-semibold disabled:opacity-50 disabled:cursor-not-allowed"
        >
          Record
        </button>
        <button
          onClick={onStop}
          disabled={!recording || busy}
          className="px-4 py-2 rounded-lg bg-gray-600 hover:bg-gray-700 text-white font-semibold disabled:opacity-50 disabled:cursor-not-allowed"
        >
          Stop
        </button>
        {recording && (
          <span className="flex items-center gap-2 text-red-400 text-sm">
            <span className="w-3 h-3 rounded-full bg-red-500 animate-pulse" />
            REC
          </span>
        )}
      </div>
      <p role="status" className="text-gray-300 text-sm">
        {status}
      </p>
    </div>
  );
}

export default RecordingControls;
