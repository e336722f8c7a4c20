import type {
  ChangeFeedLinkOptions,
  ProjectChangeFeed,
  ProjectSubscriptionService,
  ProjectSubscriptionUpdate,
  ProjectUpdateHandler,
} from '../core/types.js';
import type { Disposable } from '../utils/events.js';
import { log } from '../utils/logger.js';

interface Link {
  handler: ProjectUpdateHandler;
  ruleNames: ReadonlySet<string>;
}

/**
 * In-process change feed: batches published here reach every live link whose
 * rule filter matches.
 */
export class ManifestChangeFeed implements ProjectChangeFeed, ProjectSubscriptionService {
  private links: Link[] = [];

  get projectRuleSource(): ProjectChangeFeed {
    return this;
  }

  get linkCount(): number {
    return this.links.length;
  }

  link(handler: ProjectUpdateHandler, options: ChangeFeedLinkOptions): Disposable {
    const link: Link = { handler, ruleNames: new Set(options.ruleNames) };
    this.links.push(link);
    return {
      dispose: () => {
        this.links = this.links.filter(candidate => candidate !== link);
      },
    };
  }

  /**
   * Deliver `update` to the matching links, one after another.
   */
  async publish(update: ProjectSubscriptionUpdate): Promise<void> {
    for (const link of [...this.links]) {
      if (!this.links.includes(link)) {
        continue;
      }
      const matches = [...update.projectChanges.keys()].some(rule => link.ruleNames.has(rule));
      if (!matches) {
        continue;
      }
      try {
        await link.handler(update);
      } catch (error) {
        log.error('Change feed handler failed', error, { version: update.version });
      }
    }
  }
}
