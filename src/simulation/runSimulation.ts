import { APP_CONFIG } from '../lib/config';
import { logger } from '../lib/logger';
import { getForumEngine } from '../lib/forumEngine';
import { createSeededRandom } from '../lib/seededRandom';
import { resolveSimulationOptions, simulateActivity } from '../lib/activitySimulator';
import { buildSimulationReport, formatSimulationReport } from '../lib/simulationReport';
import { validateSeed } from '../lib/validation';

export async function runSimulation(): Promise<string[]> {
  const options = resolveSimulationOptions({
    userCount: APP_CONFIG.simulation.userCount,
    communityCount: APP_CONFIG.simulation.communityCount,
    concurrency: APP_CONFIG.simulation.concurrency,
  });
  const rng = createSeededRandom(validateSeed(APP_CONFIG.simulation.seed ?? Date.now()));
  const engine = getForumEngine();

  await simulateActivity(engine, options, rng);
  const report = await buildSimulationReport(engine, rng, { seed: rng.seed });
  return formatSimulationReport(report);
}

if (require.main === module) {
  runSimulation()
    .then((lines) => {
      for (const line of lines) console.log(line);
    })
    .catch((err: unknown) => {
      logger.error('Simulation failed', err instanceof Error ? err : new Error(String(err)));
      process.exitCode = 1;
    });
}
