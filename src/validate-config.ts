#!/usr/bin/env tsx

import { configPath } from './env.js';

import { loadConfigFile } from './config/load.js';
import { generateSlug } from './config/slugify.js';
import { createLogger } from './logger.js';
import { errMsg } from './utils/error.js';

const log = createLogger('Validate');

const path = process.argv[2] ?? configPath();

try {
  const config = loadConfigFile(path);
  log.info(`${path} is valid.`);
  for (const scale of config.scales) {
    const sensors = scale.impedance_sensor
      ? `${scale.weight_sensor} + ${scale.impedance_sensor}`
      : scale.weight_sensor;
    log.info(`  Scale '${scale.id}' (${sensors})`);
    for (const person of scale.people) {
      log.info(
        `    ${person.name} [${generateSlug(person.name)}]: ` +
          `${person.expected_weight} kg ± score ${person.tolerance}`,
      );
    }
  }
  log.info(`  Webhook: ${config.webhook ? config.webhook.url : 'disabled'}`);
} catch (err) {
  log.error(errMsg(err));
  process.exit(1);
}
