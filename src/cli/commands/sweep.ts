/**
 * Sweep Command
 *
 * Expires every awaiting assignment older than the configured expiry. The
 * scheduler does this lazily per session; the sweep is for deployments that
 * want stale assignments closed without waiting for the session to return.
 */

import type { DrillServices } from '../../services';
import { dim, green } from '../utils/terminal';

export async function runSweepCommand(services: DrillServices): Promise<number> {
  const expired = await services.scheduler.expireStale();
  console.log(expired > 0 ? green(`Expired ${expired} assignment(s).`) : dim('No stale assignments.'));
  return expired;
}
