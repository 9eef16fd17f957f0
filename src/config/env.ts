export interface AppConfig {
  port: number;
  host: string;
  appName: string;
  logRequests: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 4000;

const parsePort = (value: string | undefined) => {
  const port = Number(value);
  return value && Number.isInteger(port) && port >= 0 && port <= 65535
    ? port
    : DEFAULT_PORT;
};

export const loadConfig = (env: Env): AppConfig => ({
  port: parsePort(env.PORT),
  host: env.HOST || "localhost",
  appName: env.APP_NAME || "Hello",
  logRequests: env.LOG_REQUESTS !== "false",
});

// Read lazily so dotenv.config() in server.ts runs first
export const getConfig = (): AppConfig => loadConfig(process.env);
