// Centralized, typed configuration for the API
// Export a default factory so ConfigModule.load can consume it.
export interface IssConfig {
  baseUrl: string;
  primaryBoard: string; // main trading venue for shares
  exchange: string;
  defaultCurrency: string;
  timeoutMs: number;
  maxSockets: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  iss: IssConfig;
}

export default (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '4000', 10),

  iss: {
    baseUrl: process.env.ISS_BASE_URL ?? 'https://iss.moex.com/iss',
    primaryBoard: process.env.ISS_PRIMARY_BOARD ?? 'TQBR',
    exchange: 'MOEX',
    defaultCurrency: 'RUB',
    timeoutMs: parseInt(process.env.ISS_TIMEOUT_MS ?? '10000', 10),
    maxSockets: parseInt(process.env.ISS_MAX_SOCKETS ?? '8', 10),
  },
});
