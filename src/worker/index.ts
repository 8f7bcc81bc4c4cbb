/**
 * Worker - video task pipeline
 *
 * Wires the pipeline stages to their configured clients and runs task jobs
 * in the background of the API process.
 */

import { ConfigService } from './services/ConfigService.js';
import { ClientFactory } from './services/ClientFactory.js';
import { MediaDownloadService } from './services/MediaDownloadService.js';
import { VideoPipelineService } from './services/VideoPipelineService.js';
import { ParserApiAdapter } from './services/adapters/ParserApiAdapter.js';
import { FfmpegAudioExtractor } from './services/adapters/FfmpegAudioExtractor.js';
import { AIClientFactory } from './services/factories/AIClientFactory.js';
import { NotifierFactory } from './services/factories/NotifierFactory.js';
import { TaskStoreFactory } from './services/factories/TaskStoreFactory.js';
import { FileManagerImpl } from './services/implementations/FileManagerImpl.js';
import { TaskStore } from './services/interfaces/TaskStore.js';
import { TaskWorker } from './TaskWorker.js';

// Export all classes/services that are used in tests
export { ConfigService } from './services/ConfigService.js';
export { ClientFactory } from './services/ClientFactory.js';
export { VideoPipelineService } from './services/VideoPipelineService.js';
export { TaskWorker } from './TaskWorker.js';
export * from './errors.js';

export interface PipelineRuntime {
  store: TaskStore;
  worker: TaskWorker;
  pipeline: VideoPipelineService;
}

export function createPipelineRuntime(config: ConfigService, clients: ClientFactory): PipelineRuntime {
  const http = clients.createAxiosClient();
  const fileManager = new FileManagerImpl();
  const parserConfig = config.getParserConfig();
  const mediaConfig = config.getMediaConfig();
  const pipelineConfig = config.getPipelineConfig();

  const store = TaskStoreFactory.create(config, clients);
  const worker = new TaskWorker(pipelineConfig.workerConcurrency);
  const { transcriber, summarizer } = AIClientFactory.create(config.getAIConfig(), http);

  const pipeline = new VideoPipelineService(
    {
      store,
      resolver: new ParserApiAdapter(http, parserConfig),
      fetcher: new MediaDownloadService(http, fileManager, { timeoutMs: mediaConfig.downloadTimeoutMs }),
      extractor: new FfmpegAudioExtractor(fileManager, {
        ffmpegPath: mediaConfig.ffmpegPath,
        timeoutMs: mediaConfig.ffmpegTimeoutMs
      }),
      transcriber,
      summarizer,
      notifier: NotifierFactory.create(config.getNotifierConfig(), http),
      dispatcher: worker
    },
    {
      mediaRoot: mediaConfig.mediaRoot,
      allowedHosts: parserConfig.allowedHosts,
      retryBaseDelayMs: pipelineConfig.retryBaseDelayMs
    }
  );

  return { store, worker, pipeline };
}
