interface CameraSelectorProps {
  labels: string[];
  active: string;
  disabled?: boolean;
  onSelect: (label: string) => void;
  onToggle: () => void;
}

function CameraSelector({ labels, active, disabled = false, onSelect, onToggle }: CameraSelectorProps) {
  return (
    <div className="flex items-center gap-3">
      <label htmlFor="selector" className="text-gray-300 text-sm">
        Camera
      </label>
      <select
        id="selector"
        value={active}
        disabled={disabled}
        onChange={(e) => onSelect(e.target.value)}
        className="bg-gray-800 text-white rounded-lg px-3 py-2 border border-gray-600"
      >
        {labels.map((label) => (
          <option key={label} value={label}>
            {label}
          </option>
        ))}
      </select>
      <button
        onClick={onToggle}
        disabled={disabled}
        className="px-4 py-2 rounded-lg bg-blue-600 hover:bg-blue-700 text-white font-semibold disabled:opacity-50 disabled:cursor-not-allowed"
      >
        Switch camera
      </button>
      <span className="text-gray-400 text-sm">
        Active: <span data-testid="active-label" className="text-white font-medium">{active}</span>
      </span>
    </div>
  );
}

export default CameraSelector;
