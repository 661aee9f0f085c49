import { useCallback, useEffect, useRef, useState } from "react";
import { ParameterPanel } from "../components/ParameterPanel";
import { PresetList } from "../components/PresetList";
import { TransportControls } from "../components/TransportControls";
import { MemoryShaderFileSystem } from "../core/presets/shaderFileSystem";
import { FrameLoop } from "../core/render/frameLoop";
import { EFFECT_SHADER_TEMPLATE } from "../core/render/shaderComposer";
import { WebGlEffectBackend } from "../core/render/webglBackend";
import { loadPersistedState, savePersistedState, type PersistedState } from "../utils/persistence";
import { EffectSession } from "./effectSession";
import { DEFAULT_EFFECT_SETTINGS } from "./settings";

interface TransportState {
  playing: boolean;
  currentTime: number;
  duration: number;
}

interface InitialState {
  persisted: PersistedState;
  persistenceError: string | null;
}

function buildInitialState(): InitialState {
  const empty: PersistedState = {
    presets: [],
    settings: { ...DEFAULT_EFFECT_SETTINGS },
    shaderFilesByPath: {},
    activePresetName: null
  };
  try {
    return { persisted: loadPersistedState() ?? empty, persistenceError: null };
  } catch (error) {
    return { persisted: empty, persistenceError: error instanceof Error ? error.message : String(error) };
  }
}

function seedShaderLibrary(files: MemoryShaderFileSystem, directory: string): void {
  if (files.listFiles(directory).length === 0) {
    files.writeText(`${directory}/vignette.glsl`, EFFECT_SHADER_TEMPLATE);
  }
}

function isTextEntryTarget(target: EventTarget | null): boolean {
  return target instanceof HTMLTextAreaElement || target instanceof HTMLInputElement || target instanceof HTMLSelectElement;
}

export function App(): JSX.Element {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const videoRef = useRef<HTMLVideoElement | null>(null);
  const filesRef = useRef<MemoryShaderFileSystem | null>(null);
  const [session, setSession] = useState<EffectSession<WebGLProgram> | null>(null);
  const [, setVersion] = useState(0);
  const [startupError, setStartupError] = useState<string | null>(null);
  const [editorSource, setEditorSource] = useState(EFFECT_SHADER_TEMPLATE);
  const [newFileName, setNewFileName] = useState("my-effect.glsl");
  const [editorDiagnostic, setEditorDiagnostic] = useState("");
  const [transport, setTransport] = useState<TransportState>({ playing: false, currentTime: 0, duration: 0 });
  const [loopVideo, setLoopVideo] = useState(true);

  useEffect(() => {
    const video = videoRef.current;
    if (video === null) {
      return;
    }
    const sync = (): void => {
      setTransport({ playing: !video.paused, currentTime: video.currentTime, duration: video.duration });
    };
    const events = ["play", "pause", "timeupdate", "loadedmetadata", "seeked", "emptied"] as const;
    for (const name of events) {
      video.addEventListener(name, sync);
    }
    return () => {
      for (const name of events) {
        video.removeEventListener(name, sync);
      }
    };
  }, []);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (canvas === null) {
      return;
    }
    const initial = buildInitialState();
    if (initial.persistenceError !== null) {
      console.warn(`[app] Ignoring stored state: ${initial.persistenceError}`);
    }

    let backend: WebGlEffectBackend;
    try {
      backend = new WebGlEffectBackend({ canvas });
    } catch (error) {
      setStartupError(error instanceof Error ? error.message : String(error));
      return;
    }

    const files = new MemoryShaderFileSystem(initial.persisted.shaderFilesByPath);
    seedShaderLibrary(files, initial.persisted.settings.shaderDirectory);
    filesRef.current = files;

    const next = new EffectSession({ backend, files, settings: initial.persisted.settings });
    next.restore(initial.persisted.presets, initial.persisted.activePresetName);
    setEditorSource(next.getActivePreset()?.sourceText ?? EFFECT_SHADER_TEMPLATE);
    setSession(next);

    const loop = new FrameLoop((timeSeconds) => {
      const video = videoRef.current;
      if (video !== null && video.readyState >= HTMLMediaElement.HAVE_CURRENT_DATA) {
        backend.uploadVideoFrame(video, video.videoWidth, video.videoHeight);
      }
      const dpr = window.devicePixelRatio || 1;
      backend.setViewportSize(canvas.clientWidth * dpr, canvas.clientHeight * dpr);
      next.tick(timeSeconds);
    });
    loop.start();
    console.info("[app] Effect session started.");

    return () => {
      loop.stop();
      backend.destroy();
      setSession(null);
    };
  }, []);

  useEffect(() => {
    if (session === null) {
      return;
    }
    return session.subscribe(() => {
      setVersion(session.getVersion());
      const files = filesRef.current;
      if (files === null) {
        return;
      }
      savePersistedState({
        presets: session.toPersistedPresets(),
        settings: session.getSettings(),
        shaderFilesByPath: files.toRecord(),
        activePresetName: session.getActivePreset()?.name ?? null
      });
    });
  }, [session]);

  const compileEditor = useCallback(() => {
    if (session === null) {
      return;
    }
    setEditorDiagnostic(session.compileEditorSource(editorSource).diagnostic);
  }, [editorSource, session]);

  const saveEditor = useCallback(() => {
    if (session === null) {
      return;
    }
    const path = `${session.getSettings().shaderDirectory}/${newFileName.trim()}`;
    try {
      setEditorDiagnostic(session.saveEditorSource(editorSource, path).diagnostic);
    } catch (error) {
      setEditorDiagnostic(error instanceof Error ? error.message : String(error));
    }
  }, [editorSource, newFileName, session]);

  useEffect(() => {
    const onKeyDown = (event: KeyboardEvent): void => {
      if (event.key === "F5") {
        event.preventDefault();
        compileEditor();
        return;
      }
      if (session === null || isTextEntryTarget(event.target)) {
        return;
      }
      if (session.handleKey(event)) {
        event.preventDefault();
        setEditorSource(session.getActivePreset()?.sourceText ?? EFFECT_SHADER_TEMPLATE);
      }
    };
    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [compileEditor, session]);

  const autoCompileDelayMs = session?.getSettings().autoCompileDelayMs ?? 0;
  const activePreset = session?.getActivePreset() ?? null;
  const activeSource = activePreset?.sourceText ?? null;

  // Live compile while typing; a delay of 0 turns it off.
  useEffect(() => {
    if (session === null || autoCompileDelayMs === 0 || activeSource === null || editorSource === activeSource) {
      return;
    }
    const timer = window.setTimeout(compileEditor, autoCompileDelayMs);
    return () => window.clearTimeout(timer);
  }, [activeSource, autoCompileDelayMs, compileEditor, editorSource, session]);

  const activate = (index: number | null): void => {
    if (session === null) {
      return;
    }
    session.activate(index);
    setEditorSource(session.getActivePreset()?.sourceText ?? EFFECT_SHADER_TEMPLATE);
    setEditorDiagnostic("");
  };

  const playVideo = (): void => {
    videoRef.current?.play().catch((error: unknown) => {
      console.warn(`[app] Video playback failed: ${String(error)}`);
    });
  };

  const stopVideo = (): void => {
    const video = videoRef.current;
    if (video === null) {
      return;
    }
    video.pause();
    video.currentTime = 0;
  };

  const seekVideo = (seconds: number): void => {
    const video = videoRef.current;
    if (video !== null) {
      video.currentTime = seconds;
    }
  };

  const importShaders = (fileList: FileList | null): void => {
    if (session === null || fileList === null) {
      return;
    }
    for (const file of Array.from(fileList)) {
      file
        .text()
        .then((text) => {
          session.importShaderFile(file.name, text);
        })
        .catch((error: unknown) => {
          console.warn(`[app] Shader import failed: ${error instanceof Error ? error.message : String(error)}`);
        });
    }
  };

  const openVideo = (file: File | undefined): void => {
    const video = videoRef.current;
    if (file === undefined || video === null) {
      return;
    }
    if (video.src.startsWith("blob:")) {
      URL.revokeObjectURL(video.src);
    }
    video.src = URL.createObjectURL(file);
    playVideo();
  };

  const settings = session?.getSettings() ?? DEFAULT_EFFECT_SETTINGS;
  const diagnostic = activePreset?.diagnostic ?? editorDiagnostic;

  return (
    <div className="app-shell">
      <aside className="app-sidebar">
        <h2>Effects</h2>
        <PresetList
          presets={session?.getPresets() ?? []}
          activeIndex={session?.controller.activePresetIndex ?? null}
          onActivate={activate}
          onRemove={(index) => {
            session?.removePreset(index);
            setEditorSource(session?.getActivePreset()?.sourceText ?? EFFECT_SHADER_TEMPLATE);
          }}
          onShortcutChange={(index, shortcut) => session?.setShortcut(index, shortcut)}
        />
        <h2>Settings</h2>
        <label className="settings-row">
          <input
            type="checkbox"
            checked={settings.fileWatching}
            onChange={(event) => session?.updateSettings({ fileWatching: event.target.checked })}
          />
          Watch shader files
        </label>
        <label className="settings-row">
          <input
            type="checkbox"
            checked={settings.preserveValuesOnFileReload}
            onChange={(event) => session?.updateSettings({ preserveValuesOnFileReload: event.target.checked })}
          />
          Keep values on file reload
        </label>
        <label className="settings-row">
          <input
            type="checkbox"
            checked={settings.autoCompileOnSave}
            onChange={(event) => session?.updateSettings({ autoCompileOnSave: event.target.checked })}
          />
          Compile on save
        </label>
        <label className="settings-row">
          Live compile delay (ms)
          <input
            type="number"
            min={0}
            max={5000}
            value={settings.autoCompileDelayMs}
            onChange={(event) => session?.updateSettings({ autoCompileDelayMs: Number(event.target.value) })}
          />
        </label>
      </aside>

      <main className="app-main">
        <div className="viewport">
          <canvas ref={canvasRef} className="viewport-canvas" />
          <video ref={videoRef} className="viewport-video" loop={loopVideo} muted playsInline hidden />
          {startupError !== null ? <div className="viewport-error">{startupError}</div> : null}
        </div>
        <div className="toolbar">
          <label>
            Video
            <input type="file" accept="video/*" onChange={(event) => openVideo(event.target.files?.[0])} />
          </label>
          <TransportControls
            playing={transport.playing}
            currentTime={transport.currentTime}
            duration={transport.duration}
            onPlay={playVideo}
            onPause={() => videoRef.current?.pause()}
            onStop={stopVideo}
            onSeek={seekVideo}
            loop={loopVideo}
            onLoopChange={setLoopVideo}
          />
          <label>
            Import shaders
            <input
              type="file"
              accept=".glsl,.frag,.fs"
              multiple
              onChange={(event) => {
                importShaders(event.target.files);
                event.target.value = "";
              }}
            />
          </label>
          <ul className="notifications">
            {(session?.notifications ?? []).map((message, index) => (
              <li key={`${index}-${message}`}>{message}</li>
            ))}
          </ul>
        </div>
        <div className="editor">
          <textarea
            className="editor-source"
            aria-label="Shader source"
            spellCheck={false}
            value={editorSource}
            onChange={(event) => setEditorSource(event.target.value)}
          />
          <div className="editor-actions">
            <button type="button" onClick={compileEditor}>
              Compile (F5)
            </button>
            {activePreset?.sourcePath === null || activePreset === null ? (
              <input
                aria-label="File name"
                value={newFileName}
                onChange={(event) => setNewFileName(event.target.value)}
              />
            ) : null}
            <button type="button" onClick={saveEditor}>
              Save
            </button>
            <button
              type="button"
              onClick={() => {
                activate(null);
                setEditorSource(EFFECT_SHADER_TEMPLATE);
              }}
            >
              New effect
            </button>
          </div>
          {diagnostic.length > 0 ? <pre className="editor-diagnostic">{diagnostic}</pre> : null}
        </div>
      </main>

      <aside className="app-parameters">
        <h2>{activePreset?.name ?? "Passthrough"}</h2>
        {activePreset !== null && session !== null ? (
          <ParameterPanel
            parameters={activePreset.parameters}
            onChange={(name, value) => session.setParameterValue(name, value)}
            onReset={() => session.resetParameters()}
          />
        ) : null}
      </aside>
    </div>
  );
}
