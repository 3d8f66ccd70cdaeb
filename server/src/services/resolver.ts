import type { KnowledgeSource, RaceOutcome, SourceResult } from '../types.js';
import { describeError } from '../tools/shared/web.js';

export const NO_ANSWER: RaceOutcome = Object.freeze({ answer: '', source: '' });

/**
 * Runs every source concurrently against `query` and settles with the first
 * non-blank answer in completion order. One deadline covers the whole race;
 * when it passes, or every source has come back empty, the result is
 * `NO_ANSWER`. Lookups still in flight are aborted once the race settles and
 * whatever they return afterwards is dropped.
 */
export function resolve(
  query: string,
  sources: readonly KnowledgeSource[],
  deadlineMs: number
): Promise<RaceOutcome> {
  return new Promise<RaceOutcome>(settle => {
    const controllers = sources.map(() => new AbortController());
    let pending = sources.length;
    let done = false;

    const finish = (outcome: RaceOutcome) => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      for (const ctrl of controllers) ctrl.abort();
      settle(outcome);
    };

    const timer = setTimeout(() => {
      console.log(`race for "${query}" hit the ${deadlineMs}ms deadline`);
      finish(NO_ANSWER);
    }, deadlineMs);

    if (pending === 0) {
      finish(NO_ANSWER);
      return;
    }

    sources.forEach((source, i) => {
      const signal = controllers[i].signal;
      void new Promise<SourceResult>(run => run(source.lookup(query, signal)))
        .then(result => {
          if (done) return;
          const answer = result.answer.trim();
          if (!answer) return;
          console.log(`race for "${query}" won by ${source.name}`);
          finish({ answer, source: result.source || source.name });
        })
        .catch((err: unknown) => {
          console.warn(`${source.name} lookup threw: ${describeError(err)}`);
        })
        .finally(() => {
          pending -= 1;
          if (pending === 0) finish(NO_ANSWER);
        });
    });
  });
}
