import { AcquisitionPipeline } from './acquire';
import { ClipSynthesizer } from './clip';
import { CorpusIndex } from './corpus';
import { CommandEmbedder, type Embedder } from './embed';
import { ENV, type Env } from './env';
import { FfmpegEncoder, type Encoder } from './ffmpeg';
import { TranscriptStore } from './store';
import { CommandTranscriber, primingPhraseFor, type Transcriber } from './transcribe';
import { YtDlp, type MediaDownloader } from './ytdlp';

export interface Capabilities {
  downloader: MediaDownloader;
  transcriber: Transcriber;
  embedder: Embedder;
  encoder: Encoder;
}

export function createCapabilities(overrides: Partial<Capabilities> = {}): Capabilities {
  return {
    downloader: overrides.downloader ?? new YtDlp(),
    transcriber: overrides.transcriber ?? new CommandTranscriber(),
    embedder: overrides.embedder ?? new CommandEmbedder(),
    encoder: overrides.encoder ?? new FfmpegEncoder(),
  };
}

export interface App {
  env: Env;
  capabilities: Capabilities;
  store: TranscriptStore;
  acquisition: AcquisitionPipeline;
  index: CorpusIndex;
  clips: ClipSynthesizer;
}

/** Builds every component once around a single set of capability handles. */
export function createApp(capabilities: Capabilities = createCapabilities(), env: Env = ENV): App {
  const store = new TranscriptStore(env.subsDir);
  return {
    env,
    capabilities,
    store,
    acquisition: new AcquisitionPipeline(store, capabilities.downloader, capabilities.transcriber, {
      language: env.language,
      initialPrompt: primingPhraseFor(env.language, env.transcribePrompt),
      tempDir: env.tempDir,
      beamSize: env.transcribeBeamSize,
    }),
    index: new CorpusIndex(store, capabilities.embedder),
    clips: new ClipSynthesizer(capabilities.downloader, capabilities.encoder, {
      clipsDir: env.clipsDir,
      configuredFont: env.fontFile,
      platformBaseUrl: env.platformBaseUrl,
    }),
  };
}
