interface TransportControlsProps {
  playing: boolean;
  currentTime: number;
  duration: number;
  loop: boolean;
  onPlay: () => void;
  onPause: () => void;
  onStop: () => void;
  onSeek: (seconds: number) => void;
  onLoopChange: (loop: boolean) => void;
}

export function formatTimecode(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return "0:00";
  }
  const whole = Math.floor(seconds);
  return `${Math.floor(whole / 60)}:${String(whole % 60).padStart(2, "0")}`;
}

export function TransportControls(props: TransportControlsProps): JSX.Element {
  const duration = Number.isFinite(props.duration) && props.duration > 0 ? props.duration : 0;
  return (
    <div className="transport-controls">
      <button type="button" onClick={props.playing ? props.onPause : props.onPlay}>
        {props.playing ? "Pause" : "Play"}
      </button>
      <button type="button" onClick={props.onStop}>
        Stop
      </button>
      <input
        type="range"
        aria-label="Seek"
        min={0}
        max={duration}
        step={0.01}
        value={Math.min(props.currentTime, duration)}
        disabled={duration === 0}
        onChange={(event) => props.onSeek(Number(event.target.value))}
      />
      <span className="transport-time">
        {formatTimecode(props.currentTime)} / {formatTimecode(duration)}
      </span>
      <label className="transport-loop">
        <input type="checkbox" checked={props.loop} onChange={(event) => props.onLoopChange(event.target.checked)} />
        Loop
      </label>
    </div>
  );
}
