export type DeploymentMode = 'PRODUCTION' | 'DEVELOPMENT';

export function isProduction(mode: DeploymentMode): boolean {
  return mode === 'PRODUCTION';
}

export function describeMode(mode: DeploymentMode): string {
  return mode === 'PRODUCTION'
    ? '[MODE] PRODUCTION (system-wide, supervisor managed)'
    : '[MODE] DEVELOPMENT (local, start/stop scripts)';
}
