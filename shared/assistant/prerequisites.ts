import type { SessionContextManager } from './session';
import type { Prerequisite } from './types';

export interface PrerequisiteChecker {
  /** Returns the unmet subset of `prerequisites`, preserving their order. */
  checkAll(prerequisites: readonly Prerequisite[]): Promise<Prerequisite[]>;
}

export const PREREQUISITE_MESSAGES: Readonly<Record<Prerequisite, string>> = Object.freeze({
  RECOVERY_DATA:
    "I don't have any recovery data yet. Log your sleep, HRV, or readiness score first, and I'll give you insights.",
  ROUND_ACTIVE: 'You need to start a round first. Would you like to start a new round now?',
  BAG_CONFIGURED:
    "Your bag isn't configured yet. Set up your clubs and distances so I can give you better recommendations.",
  COURSE_SELECTED: 'Which course are you playing? Select a course to get specific information.',
});

/** Guidance for unmet prerequisites, one sentence group per prerequisite in declared order. */
export function prerequisiteMessage(missing: readonly Prerequisite[]): string {
  return missing.map((prerequisite) => PREREQUISITE_MESSAGES[prerequisite]).join(' ');
}

export type AsyncFlag = () => Promise<boolean> | boolean;

export interface SessionPrerequisiteSources {
  session: SessionContextManager;
  hasRecoveryData: AsyncFlag;
  isBagConfigured: AsyncFlag;
  /** Defaults to "a round with a course name is active". */
  isCourseSelected?: AsyncFlag;
}

/**
 * Answers round and course questions from the session and asks the
 * injected sources about recovery data and bag setup.
 */
export class SessionPrerequisiteChecker implements PrerequisiteChecker {
  constructor(private readonly sources: SessionPrerequisiteSources) {}

  async checkAll(prerequisites: readonly Prerequisite[]): Promise<Prerequisite[]> {
    const unmet: Prerequisite[] = [];
    for (const prerequisite of prerequisites) {
      if (!(await this.isMet(prerequisite))) {
        unmet.push(prerequisite);
      }
    }
    return unmet;
  }

  private async isMet(prerequisite: Prerequisite): Promise<boolean> {
    switch (prerequisite) {
      case 'ROUND_ACTIVE':
        return this.sources.session.hasActiveRound();
      case 'COURSE_SELECTED': {
        if (this.sources.isCourseSelected) {
          return Boolean(await this.sources.isCourseSelected());
        }
        const round = this.sources.session.snapshot().round;
        return Boolean(round && round.courseName.trim());
      }
      case 'RECOVERY_DATA':
        return Boolean(await this.sources.hasRecoveryData());
      case 'BAG_CONFIGURED':
        return Boolean(await this.sources.isBagConfigured());
    }
  }
}

/** Reports a fixed set of prerequisites as unmet. */
export class StaticPrerequisiteChecker implements PrerequisiteChecker {
  readonly calls: Prerequisite[][] = [];
  private readonly unmet: ReadonlySet<Prerequisite>;

  constructor(unmet: Iterable<Prerequisite> = []) {
    this.unmet = new Set(unmet);
  }

  async checkAll(prerequisites: readonly Prerequisite[]): Promise<Prerequisite[]> {
    this.calls.push([...prerequisites]);
    return prerequisites.filter((prerequisite) => this.unmet.has(prerequisite));
  }
}
