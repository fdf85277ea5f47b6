export const DEPLOYMENT_PROFILES = ['local', 'tei', 'openai', 'production'] as const;

export type DeploymentProfile = (typeof DEPLOYMENT_PROFILES)[number];

export interface ServiceState {
  state: string;
  /** Container health as reported by compose; `unknown` when it has no healthcheck */
  health: string;
}

export interface ComponentHealth {
  ragApi: boolean;
  database: boolean;
  embeddings: boolean;
}

export interface ServicePorts {
  ragApi: number;
  database: number;
  embeddings: number | null;
}

export interface ServerStatus {
  deployment: DeploymentProfile;
  services: Record<string, ServiceState>;
  health: ComponentHealth;
  ports: ServicePorts;
}
