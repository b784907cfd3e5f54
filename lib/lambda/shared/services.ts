import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { ChoiceEngine } from '../../game/choices';
import { ContentGateway } from '../../game/gateway';
import { MissionService } from '../../game/missions';
import { NarrativeGraph } from '../../game/narrative-graph';
import { PlayerLocks } from '../../game/player-lock';
import { ProgressService } from '../../game/progress';
import { defaultRuntime, type Runtime } from '../../game/runtime';
import { BedrockModelClient, type ModelClient } from './bedrock';
import { loadConfig, type AppConfig } from './config';
import { docClient } from './db';
import { DynamoGameStore } from './dynamo-store';
import type { GameStore } from './store';

export interface Services {
  progress: ProgressService;
  missions: MissionService;
  choices: ChoiceEngine;
  graph: NarrativeGraph;
}

export interface ServiceDependencies {
  store: GameStore;
  model: ModelClient;
  config: AppConfig;
  runtime?: Runtime;
}

/** Wires the game services around one store, model and lock table. */
export function createServices(deps: ServiceDependencies): Services {
  const runtime = deps.runtime ?? defaultRuntime;
  const locks = new PlayerLocks();
  const gateway = new ContentGateway(deps.model, {
    timeoutMs: deps.config.GENERATION_TIMEOUT_MS,
    maxTokens: deps.config.GENERATION_MAX_TOKENS,
    temperature: deps.config.GENERATION_TEMPERATURE,
  });
  const graph = new NarrativeGraph(deps.store, runtime);

  return {
    progress: new ProgressService(deps.store, locks, runtime),
    missions: new MissionService(deps.store, gateway, graph, locks, runtime),
    choices: new ChoiceEngine(deps.store, gateway, graph, locks, runtime),
    graph,
  };
}

let services: Services | undefined;

/** Services for this Lambda container, built on first use from the environment. */
export function getServices(): Services {
  if (!services) {
    const config = loadConfig();
    services = createServices({
      store: new DynamoGameStore(docClient, config),
      model: new BedrockModelClient(new BedrockRuntimeClient({}), config.BEDROCK_DEFAULT_MODEL_ID, {
        default: config.BEDROCK_DEFAULT_MODEL_ID,
        kinds: config.BEDROCK_MODEL_OVERRIDES,
      }),
      config,
    });
  }
  return services;
}
