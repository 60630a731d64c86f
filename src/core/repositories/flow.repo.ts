import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { config } from '@config/env.config.js';
import { logger } from '@utils/logger.js';

import { ConfigurationError, FlowValidationError } from '../errors/index.js';
import type { FlowDefinition } from '../interfaces/flow.types.js';

import { parseFlowDefinition } from './flow.schema.js';

export interface FlowSource {
  load(tenant: string): Promise<FlowDefinition>;
}

const reason = (err: unknown) => (err instanceof Error ? err.message : String(err));

const TENANT_NAME = /^[A-Za-z0-9_-]+$/;

export function tenantConfigPath(root: string, tenant: string, file: string): string {
  if (!TENANT_NAME.test(tenant)) {
    throw new ConfigurationError(`invalid tenant name: ${JSON.stringify(tenant)}`);
  }
  return path.join(root, tenant, file);
}

/** Reads `<root>/<tenant>/flow.json`. */
export class FileFlowRepository implements FlowSource {
  constructor(private readonly root = config.CONFIG_ROOT) {}

  async load(tenant: string): Promise<FlowDefinition> {
    const file = tenantConfigPath(this.root, tenant, 'flow.json');

    let raw: string;
    try {
      raw = await readFile(file, 'utf8');
    } catch (err) {
      throw new ConfigurationError(`cannot read ${file}: ${reason(err)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new FlowValidationError(tenant, [`invalid JSON in ${file}: ${reason(err)}`]);
    }

    const result = parseFlowDefinition(json);
    if (!result.ok) {
      throw new FlowValidationError(tenant, result.issues);
    }
    for (const warning of result.warnings) {
      logger.warn('[flow] definition warning', { tenant, warning });
    }
    logger.info('[flow] definition loaded', {
      tenant,
      version: result.definition.version,
      states: result.definition.states.size,
    });
    return result.definition;
  }
}
