import type { ChangeEvent, ClassifiedEvent } from '../model/event.js';

const ROLLOUT_RISK =
  'may cause running instances of the service to fail during the deployment. ' +
  'It will also make a rollback of this change non-trivial.';

/**
 * Decides whether `event` can break instances still running the previous
 * release.
 *
 * A not-null constraint is safe only on a table created within the same
 * `allEvents` set, since such a table has no pre-existing rows. The lookup is
 * existence-only: it does not check that the creating change-set runs first.
 */
export function isBreaking(event: ChangeEvent, allEvents: readonly ChangeEvent[]): boolean {
  switch (event.kind) {
    case 'tableCreated':
      return false;
    case 'tableDropped':
    case 'columnDropped':
      return true;
    case 'notNullAdded':
      return !allEvents.some(other => other.kind === 'tableCreated' && other.table === event.table);
  }
}

export function describeEvent(event: ChangeEvent): string {
  switch (event.kind) {
    case 'tableCreated':
      return 'Not a breaking change';
    case 'tableDropped':
      return `Dropping the table ${event.table} ${ROLLOUT_RISK}`;
    case 'columnDropped':
      return `Dropping the column ${event.table}.${event.column} ${ROLLOUT_RISK}`;
    case 'notNullAdded':
      return `Adding a not-null constraint on column ${event.column} for table ${event.table} ` +
        'which already exists could break existing instances of the service while deploying ' +
        'and makes rolling back non-trivial.';
  }
}

/** Second pass over a fully materialized event set. */
export function classifyEvents(allEvents: readonly ChangeEvent[]): ClassifiedEvent[] {
  return allEvents.map(event => ({
    event,
    breaking: isBreaking(event, allEvents),
    message: describeEvent(event),
  }));
}
