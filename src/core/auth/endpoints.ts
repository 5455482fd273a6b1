// src/core/auth/endpoints.ts

export type CloudName = 'Global' | 'USGov' | 'USGovDoD' | 'China';

export interface CloudEndpoints {
  authorityHost: string;
  apiBaseUrl: string;
}

export const CLOUDS: Record<CloudName, CloudEndpoints> = {
  Global: {
    authorityHost: 'https://login.microsoftonline.com',
    apiBaseUrl: 'https://graph.microsoft.com',
  },
  USGov: {
    authorityHost: 'https://login.microsoftonline.us',
    apiBaseUrl: 'https://graph.microsoft.us',
  },
  USGovDoD: {
    authorityHost: 'https://login.microsoftonline.us',
    apiBaseUrl: 'https://dod-graph.microsoft.us',
  },
  China: {
    authorityHost: 'https://login.chinacloudapi.cn',
    apiBaseUrl: 'https://microsoftgraph.chinacloudapi.cn',
  },
};

// Delegated flows without a tenant sign in against the multi-tenant authority
export const COMMON_TENANT = 'common';

export class AuthorityEndpoints {
  constructor(
    private authorityHost: string,
    readonly apiBaseUrl: string
  ) {}

  authorize(tenantId: string = COMMON_TENANT): string {
    return `${this.tenantBase(tenantId)}/oauth2/v2.0/authorize`;
  }

  token(tenantId: string = COMMON_TENANT): string {
    return `${this.tenantBase(tenantId)}/oauth2/v2.0/token`;
  }

  deviceCode(tenantId: string = COMMON_TENANT): string {
    return `${this.tenantBase(tenantId)}/oauth2/v2.0/devicecode`;
  }

  /** Scope string for user-delegated flows; includes offline_access for a refresh token. */
  delegatedScopes(): string {
    return `${this.apiBaseUrl}/.default offline_access`;
  }

  /** Scope string for app-only client-credentials flows. */
  applicationScopes(): string {
    return `${this.apiBaseUrl}/.default`;
  }

  private tenantBase(tenantId: string): string {
    return `${this.authorityHost.replace(/\/+$/, '')}/${encodeURIComponent(tenantId)}`;
  }
}
