export type ApiConfig = {
  port: number;
  bodyLimit: string;
};

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const portRaw = env.PAYSCAN_API_PORT ?? "8790";
  const port = Number.parseInt(portRaw, 10);
  if (!Number.isFinite(port) || port <= 0) {
    throw new Error(`invalid PAYSCAN_API_PORT: ${portRaw}`);
  }

  return {
    port,
    bodyLimit: env.PAYSCAN_API_BODY_LIMIT?.trim() || "10mb",
  };
}
