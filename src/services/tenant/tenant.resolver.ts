import { config } from '@config/env.config.js';

/** Parses `phoneNumberId:tenant` pairs separated by commas; malformed pairs are skipped. */
export function parseTenantMapping(raw: string): Map<string, string> {
  const mapping = new Map<string, string>();
  for (const part of raw.split(',')) {
    const pair = part.trim();
    if (!pair) continue;
    const sep = pair.indexOf(':');
    if (sep === -1) continue;
    const id = pair.slice(0, sep).trim();
    const tenant = pair.slice(sep + 1).trim();
    if (id && tenant) mapping.set(id, tenant);
  }
  return mapping;
}

export class TenantResolver {
  private readonly byChannelAccount: ReadonlyMap<string, string>;

  constructor(
    mapping: ReadonlyMap<string, string>,
    private readonly defaultTenant: string,
  ) {
    this.byChannelAccount = new Map(mapping);
  }

  static fromConfig(): TenantResolver {
    return new TenantResolver(parseTenantMapping(config.TENANT_BY_PHONE_NUMBER_ID), config.DEFAULT_TENANT);
  }

  resolve(channelAccountId: string): string {
    return this.byChannelAccount.get(channelAccountId) ?? this.defaultTenant;
  }
}
