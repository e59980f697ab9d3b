/**
 * TimeMachine: wires one database to every store, the search engine and
 * the counterfactual analyzer.
 *
 * @example
 * ```typescript
 * const tm = TimeMachine.open({ config: { storage: { path: ':memory:' } }, oracle: myOracle });
 * const session = tm.sessions.createSession('tree');
 * const { timeline } = tm.engine.createTimeline({ sessionId: session.id, name: 'plan', rootContent: 'Start' });
 * await tm.engine.explore(timeline.id, { iterations: 10 });
 * tm.close();
 * ```
 */

import { ConfigManager, type ConfigOverrides } from './core/config.js';
import { createLogger, setLogger } from './core/logger.js';
import { KeyedMutex } from './core/mutex.js';
import type { ThoughtlineConfig } from './core/types.js';
import { openDatabase, type Db } from './storage/database.js';
import { SessionStore } from './branching/session-store.js';
import { BranchStore } from './branching/branch-store.js';
import { TimelineStore } from './timeline/timeline-store.js';
import { SnapshotStore } from './time-travel/snapshot-store.js';
import { MCTSEngine } from './mcts/engine.js';
import { CounterfactualAnalyzer } from './counterfactual/analyzer.js';
import { GuardedOracle } from './oracle/guarded-oracle.js';
import { LLMOracle } from './oracle/llm-oracle.js';
import type { ThoughtOracle } from './oracle/types.js';
import { OpenAIProvider } from './providers/openai.js';

export interface TimeMachineOptions {
  /** Programmatic overrides, merged over files and environment */
  config?: ConfigOverrides;
  /** Project directory holding `.thoughtline.yaml` */
  projectDir?: string;
  /** Directory holding the global `config.yaml`; defaults to ~/.thoughtline */
  globalDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Oracle backend; defaults to the configured LLM provider */
  oracle?: ThoughtOracle;
  /** Install a logger built from the logging settings */
  configureLogging?: boolean;
}

export class TimeMachine {
  private closed = false;

  private constructor(
    readonly config: ThoughtlineConfig,
    readonly db: Db,
    readonly sessions: SessionStore,
    readonly branches: BranchStore,
    readonly timelines: TimelineStore,
    readonly snapshots: SnapshotStore,
    readonly engine: MCTSEngine,
    readonly counterfactuals: CounterfactualAnalyzer,
    readonly oracle: GuardedOracle,
  ) {}

  static open(options: TimeMachineOptions = {}): TimeMachine {
    const manager = new ConfigManager(options.projectDir, { globalDir: options.globalDir, env: options.env });
    const config = manager.load(options.config);

    if (options.configureLogging) {
      setLogger(createLogger('thoughtline', { level: config.logging.level, pretty: config.logging.pretty }));
    }

    const db = openDatabase(manager.resolveStoragePath(config));
    const sessions = new SessionStore(db);
    const branches = new BranchStore(db, sessions, { maxAncestryHops: config.storage.maxAncestryHops });
    const timelines = new TimelineStore(db, sessions, branches, new KeyedMutex());
    const snapshots = new SnapshotStore(db, sessions, branches, timelines, {
      maxSnapshotChain: config.storage.maxSnapshotChain,
    });

    const backend =
      options.oracle ??
      new LLMOracle(new OpenAIProvider({ apiKey: config.oracle.apiKey, defaultModel: config.oracle.model }), {
        model: config.oracle.model,
      });
    const oracle = new GuardedOracle(backend, {
      timeoutMs: config.oracle.timeoutMs,
      defaultPrior: config.mcts.defaultPrior,
      rewardRange: config.mcts.rewardRange,
    });

    const deps = { db, sessions, branches, timelines, oracle };
    const engine = new MCTSEngine(deps, {
      settings: config.mcts,
      backtrack: config.backtrack,
      maxAncestryHops: config.storage.maxAncestryHops,
    });
    const counterfactuals = new CounterfactualAnalyzer(deps, { samples: config.counterfactual.samples });

    return new TimeMachine(config, db, sessions, branches, timelines, snapshots, engine, counterfactuals, oracle);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }
}
