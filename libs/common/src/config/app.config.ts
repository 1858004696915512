const DEFAULT_MODEL_ID = 'anthropic.claude-3-5-haiku-20241022-v1:0';

export default () => ({
  port: parseInt(process.env.PORT ?? '8081', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  apiPrefix: process.env.API_PREFIX ?? 'api/v1',
  cors: {
    origin: process.env.CORS_ORIGIN
      ? process.env.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
      : '*',
    credentials: process.env.CORS_CREDENTIALS === 'true',
  },
  logging: {
    level: process.env.LOG_LEVEL ?? 'info',
  },
  database: {
    host: process.env.PG_HOST ?? 'localhost',
    port: parseInt(process.env.PG_PORT ?? '5432', 10),
    user: process.env.PG_USER ?? 'postgres',
    password: process.env.PG_PASSWORD ?? '',
    database: process.env.PG_DATABASE ?? 'postgres',
    poolMax: parseInt(process.env.PG_POOL_MAX ?? '10', 10),
    connectionTimeoutMs: parseInt(process.env.PG_CONNECTION_TIMEOUT_MS ?? '5000', 10),
    statementTimeoutMs: parseInt(process.env.PG_STATEMENT_TIMEOUT_MS ?? '30000', 10),
  },
  aws: {
    region: process.env.AWS_REGION ?? 'us-east-1',
    accessKeyId: process.env.AWS_ACCESS_KEY_ID ?? process.env.AWS_ACCESS_KEY ?? '',
    secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY ?? process.env.AWS_SECRET_KEY ?? '',
  },
  kinesisVideo: {
    hlsExpiresSeconds: parseInt(process.env.KVS_HLS_EXPIRES_SECONDS ?? '3600', 10),
    requestTimeoutMs: parseInt(process.env.KVS_REQUEST_TIMEOUT_MS ?? '10000', 10),
  },
  bedrock: {
    modelId: process.env.BEDROCK_MODEL_ID ?? DEFAULT_MODEL_ID,
    requestTimeoutMs: parseInt(process.env.BEDROCK_REQUEST_TIMEOUT_MS ?? '60000', 10),
  },
  azure: {
    tenantId: process.env.AZURE_TENANT_ID ?? '',
    clientId: process.env.AZURE_CLIENT_ID ?? '',
    clientSecret: process.env.AZURE_CLIENT_SECRET ?? '',
    storageAccountName: process.env.AZURE_STORAGE_ACCOUNT_NAME ?? '',
    blobTimeoutMs: parseInt(process.env.AZURE_BLOB_TIMEOUT_MS ?? '15000', 10),
  },
});
