// ============================================================================
// APPLICATION CONTEXT
// ============================================================================
// Everything the engine needs, built once at startup and torn down with
// close(). Collaborators can be swapped in for tests.

import { Clock, DuskConfig, systemClock } from "../types/index.js";
import { IStorage, createStorage } from "../storage/index.js";
import { CompletionService, createCompletionService } from "../llm/index.js";
import { IntentResolver } from "../resolver/index.js";
import { OnboardingFlow, ReflectionFlow } from "../sessions/index.js";
import { Mentor } from "../mentor/index.js";
import { ConsoleNotifier, Notifier } from "../notifications/index.js";
import { Orchestrator, UserLocks } from "../orchestrator/index.js";
import { NotificationScheduler } from "../scheduler/index.js";

export interface AppOverrides {
  storage?: IStorage;
  completion?: CompletionService;
  notifier?: Notifier;
  clock?: Clock;
}

export interface AppContext {
  config: DuskConfig;
  storage: IStorage;
  completion: CompletionService;
  notifier: Notifier;
  orchestrator: Orchestrator;
  scheduler: NotificationScheduler;
  clock: Clock;
  close(): Promise<void>;
}

export async function createAppContext(config: DuskConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const clock = overrides.clock ?? systemClock;
  const storage = overrides.storage ?? createStorage(config.storage, clock);
  await storage.initialize();

  const completion = overrides.completion ?? createCompletionService(config.llm);
  const notifier = overrides.notifier ?? new ConsoleNotifier();
  const locks = new UserLocks();
  const mentor = new Mentor(completion);

  const orchestrator = new Orchestrator({
    storage,
    resolver: new IntentResolver(completion),
    onboarding: new OnboardingFlow(mentor, clock),
    reflection: new ReflectionFlow(storage, completion, clock),
    mentor,
    notifier,
    locks,
    clock,
    defaultTimezone: config.scheduler.timezone,
  });

  const scheduler = new NotificationScheduler(storage, notifier, locks, config.scheduler, clock);

  return {
    config,
    storage,
    completion,
    notifier,
    orchestrator,
    scheduler,
    clock,
    async close() {
      await scheduler.stop();
      await storage.close();
    },
  };
}
