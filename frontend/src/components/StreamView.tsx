interface StreamViewProps {
  src: string;
  enabled: boolean;
  onToggle: (enable: boolean) => void;
}

function StreamView({ src, enabled, onToggle }: StreamViewProps) {
  return (
    <div className="flex flex-col gap-3">
      <div className="relative bg-black rounded-xl overflow-hidden aspect-video">
        {enabled ? (
          <img id="view" src={src} alt="Live camera stream" className="w-full h-full object-contain" />
        ) : (
          <div className="absolute inset-0 flex items-center justify-center text-gray-400">
            Stream paused
          </div>
        )}
      </div>
      <button
        onClick={() => onToggle(!enabled)}
        className="self-start px-3 py-1 rounded-lg bg-gray-700 hover:bg-gray-600 text-white text-sm"
      >
        {enabled ? 'Pause stream' : 'Resume stream'}
      </button>
    </div>
  );
}

export default StreamView;
