#!/usr/bin/env -S node --import tsx
import { join } from 'node:path';
import { render } from 'ink';
import {
  I18nextProvider,
  Session,
  createLogger,
  initI18n,
  setLogLevel,
  setLogSink,
  type AudioBackend,
  type Track,
} from '@riffline/shared';
import { App } from './components/App';
import { USAGE, loadConfig, type RifflineConfig } from './config';
import { createFileLogSink } from './lib/fileLogSink';
import { scanLibrary } from './scanner/scanner';
import { MpvAudioBackend } from './audio/mpvBackend';
import { SimulatedAudioBackend } from './audio/simulatedBackend';
import { JsonPlaylistRepository } from './persistence/playlistRepository';
import { autosavePlaylists } from './persistence/autosave';
import { ToastNotifier } from './notifier/toastNotifier';

const log = createLogger('CLI');

async function createBackend(config: RifflineConfig): Promise<AudioBackend> {
  if (config.backend === 'simulated') {
    return new SimulatedAudioBackend();
  }
  const backend = new MpvAudioBackend({ mpvPath: config.mpvPath });
  await backend.start();
  return backend;
}

function indexTracks(tracks: readonly Track[]): Map<string, Track> {
  return new Map(tracks.map((track) => [track.id, track]));
}

async function main(argv: string[]): Promise<number> {
  const { config, help } = await loadConfig(argv);
  if (help) {
    process.stdout.write(USAGE);
    return 0;
  }

  // Ink owns stdout from here on
  setLogLevel(config.logLevel);
  setLogSink(createFileLogSink(join(config.dataDir, 'riffline.log')));
  const i18n = initI18n(config.language);
  log.info(`Starting with music from ${config.musicDir}`);

  const { tracks } = await scanLibrary(config.musicDir);
  let tracksById = indexTracks(tracks);

  const repository = new JsonPlaylistRepository({
    dataDir: config.dataDir,
    exportM3u: config.exportM3u,
    lookupTrack: (id) => tracksById.get(id),
  });
  const playlists = await repository.load();
  const backend = await createBackend(config);
  const toasts = new ToastNotifier();

  const session = new Session({
    backend,
    tracks,
    playlists,
    notifier: toasts,
    volume: config.volume,
    volumeStep: config.volumeStep,
    seekStepSeconds: config.seekStepSeconds,
    pageSize: config.pageSize,
    shuffleSeed: config.shuffleSeed,
  });
  const autosave = autosavePlaylists(session, repository);

  let scanning = false;
  session.onRescan(() => {
    if (scanning) return;
    scanning = true;
    scanLibrary(config.musicDir)
      .then((result) => {
        tracksById = indexTracks(result.tracks);
        session.replaceCatalog(result.tracks);
        session.setStatus('status.rescanned', { count: result.tracks.length });
      })
      .catch((error: unknown) => {
        log.error('Rescan failed', error);
        const reason = error instanceof Error ? error.message : String(error);
        session.setStatus('status.rescanFailed', { reason }, 'error');
      })
      .finally(() => {
        scanning = false;
      });
  });

  const app = render(
    <I18nextProvider i18n={i18n}>
      <App session={session} toasts={toasts} tickMs={config.tickMs} />
    </I18nextProvider>,
    { exitOnCtrlC: false }
  );
  await app.waitUntilExit();

  autosave.stop();
  await autosave.flush();
  let exitCode = 0;
  try {
    await repository.save(session.playlistRecord());
  } catch (error) {
    log.error('Saving playlists on exit failed', error);
    process.stderr.write(`riffline: could not save playlists: ${error instanceof Error ? error.message : String(error)}\n`);
    exitCode = 1;
  }

  session.dispose();
  await backend.dispose();
  log.info('Bye');
  return exitCode;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    log.error('Fatal startup error', error);
    process.stderr.write(`riffline: ${message}\n`);
    process.exitCode = 1;
  }
);
