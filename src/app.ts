/**
 * Wires the core modules together from a runtime configuration
 */

import * as path from 'path';
import type { CrosstalkConfig } from './config';
import { ContextStore } from './context-store/ContextStore';
import { NodeFileSystem, type FileSystem } from './context-store/FileSystem';
import { AdminCommands } from './conversation/AdminCommands';
import { CommandParser } from './conversation/CommandParser';
import { ConversationEngine } from './conversation/ConversationEngine';
import { InteractionLog } from './conversation/InteractionLog';
import type { Transport } from './conversation/types';
import { OpenAICompatibleBackend } from './generation/OpenAICompatibleBackend';
import type { GenerationBackend } from './generation/types';
import { HandlerRegistry } from './handler-registry/HandlerRegistry';
import { loadBuiltInCatalogue } from './handler-registry/catalogue';
import type { HandlerDescriptor } from './handler-registry/types';
import { setLogLevel } from './logger';
import { ResponseAssembler } from './response-assembler/ResponseAssembler';
import { Router } from './router/Router';

export const BOT_AUTHOR_ID = 'crosstalk';

export interface CrosstalkOptions {
  transport: Transport;
  fs?: FileSystem;
  /** Defaults to the OpenAI-compatible HTTP backend from config */
  backend?: GenerationBackend;
  /** Defaults to data/handlers.json */
  handlers?: HandlerDescriptor[];
  /** Test hooks */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface Crosstalk {
  config: CrosstalkConfig;
  store: ContextStore;
  registry: HandlerRegistry;
  router: Router;
  assembler: ResponseAssembler;
  engine: ConversationEngine;
  admin: AdminCommands;
  commands: CommandParser;
  interactionLog: InteractionLog;
}

export async function createCrosstalk(config: CrosstalkConfig, options: CrosstalkOptions): Promise<Crosstalk> {
  setLogLevel(config.logLevel);

  const fs = options.fs ?? new NodeFileSystem();
  const store = new ContextStore(fs, {
    storageDir: config.dataDir,
    defaultWindowSize: config.context.defaultWindowSize,
    maxWindowSize: config.context.maxWindowSize,
    now: options.now,
  });
  await store.init();

  const registry = await HandlerRegistry.load(options.handlers ?? loadBuiltInCatalogue(), fs, {
    overridesPath: path.join(config.dataDir, 'registry.json'),
  });
  const router = new Router(registry, { contextScanDepth: config.router.contextScanDepth });

  const backend = options.backend ?? new OpenAICompatibleBackend({
    baseUrl: config.generation.baseUrl,
    apiKey: config.generation.apiKey,
    timeoutMs: config.generation.timeoutMs,
    maxTokens: config.generation.maxTokens,
  });

  const { streaming } = config;
  const assembler = new ResponseAssembler(backend, store, registry, {
    chunker: {
      minChunkChars: streaming.minChunkChars,
      maxSentencesPerChunk: streaming.maxSentencesPerChunk,
    },
    pacing: {
      enabled: streaming.pacing,
      baseDelayMs: streaming.baseDelayMs,
      perCharDelayMs: streaming.perCharDelayMs,
      maxDelayMs: streaming.maxDelayMs,
    },
    reroll: config.reroll,
    defaultTemperature: config.generation.defaultTemperature,
    botAuthorId: BOT_AUTHOR_ID,
    now: options.now,
    sleep: options.sleep,
  });

  const interactionLog = new InteractionLog(fs, path.join(config.dataDir, 'interactions.jsonl'));
  const engine = new ConversationEngine(
    { store, registry, router, assembler, transport: options.transport, interactionLog },
    { timezone: config.timezone, mentionKeywords: config.router.mentionKeywords }
  );
  const admin = new AdminCommands(store, registry);

  return {
    config,
    store,
    registry,
    router,
    assembler,
    engine,
    admin,
    commands: new CommandParser(admin, engine),
    interactionLog,
  };
}
