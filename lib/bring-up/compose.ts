/** Port n8n listens on inside the container; published on loopback only. */
export const N8N_PORT = 5678;

/**
 * Variables resolved by docker-compose from the `.env` file next to the
 * descriptor. The `.env` file is written at boot from Secrets Manager so the
 * values never appear in user data.
 */
export const SECRET_ENV_VARS = {
  dbPassword: 'DB_POSTGRESDB_PASSWORD',
  encryptionKey: 'N8N_ENCRYPTION_KEY',
  adminPassword: 'N8N_BASIC_AUTH_PASSWORD',
} as const;

export interface ComposeOptions {
  readonly image: string;
  readonly domainName: string;
  readonly dbHost: string;
  readonly dbPort: number;
  readonly dbName: string;
  readonly dbUser: string;
  readonly adminUser: string;
  readonly timezone: string;
}

/**
 * docker-compose descriptor for the n8n container. Values may be CDK tokens.
 */
export function renderComposeFile(options: ComposeOptions): string {
  return `version: '3.8'
services:
  n8n:
    image: ${options.image}
    container_name: n8n
    ports:
      - "127.0.0.1:${N8N_PORT}:${N8N_PORT}"
    environment:
      DB_TYPE: postgresdb
      DB_POSTGRESDB_HOST: "${options.dbHost}"
      DB_POSTGRESDB_PORT: "${options.dbPort}"
      DB_POSTGRESDB_DATABASE: "${options.dbName}"
      DB_POSTGRESDB_USER: "${options.dbUser}"
      DB_POSTGRESDB_PASSWORD: \${${SECRET_ENV_VARS.dbPassword}}
      N8N_ENCRYPTION_KEY: \${${SECRET_ENV_VARS.encryptionKey}}
      N8N_BASIC_AUTH_ACTIVE: "true"
      N8N_BASIC_AUTH_USER: "${options.adminUser}"
      N8N_BASIC_AUTH_PASSWORD: \${${SECRET_ENV_VARS.adminPassword}}
      N8N_HOST: "${options.domainName}"
      N8N_PORT: "${N8N_PORT}"
      N8N_PROTOCOL: https
      WEBHOOK_URL: "https://${options.domainName}"
      GENERIC_TIMEZONE: "${options.timezone}"
      NODE_FUNCTION_ALLOW_EXTERNAL: "*"
    volumes:
      - n8n_data:/home/node/.n8n
    restart: unless-stopped

volumes:
  n8n_data:`;
}

export interface EnvFileOptions {
  readonly path: string;
  readonly owner: string;
  readonly region: string;
  readonly runtimeSecretArn: string;
  readonly adminSecretArn: string;
}

/**
 * Shell lines that fetch both secrets and write the `.env` file (mode 600).
 * Under errexit a failed fetch or a missing field stops the step; nothing
 * here prints a secret value.
 */
export function renderEnvFileCommands(options: EnvFileOptions): string[] {
  const fetch = (arn: string) =>
    `aws secretsmanager get-secret-value --secret-id "${arn}" --region "${options.region}" --query SecretString --output text`;
  const fields: [string, string, string][] = [
    [SECRET_ENV_VARS.dbPassword, 'RUNTIME_SECRET', 'dbPassword'],
    [SECRET_ENV_VARS.encryptionKey, 'RUNTIME_SECRET', 'encryptionKey'],
    [SECRET_ENV_VARS.adminPassword, 'ADMIN_SECRET', 'password'],
  ];

  return [
    `RUNTIME_SECRET=$(${fetch(options.runtimeSecretArn)})`,
    `ADMIN_SECRET=$(${fetch(options.adminSecretArn)})`,
    // jq -e fails on a missing or null field
    ...fields.map(([name, source, key]) => `${name}=$(printf '%s' "$${source}" | jq -er .${key})`),
    'umask 077',
    '{',
    ...fields.map(([name]) => `  printf '${name}=%s\\n' "$${name}"`),
    `} > ${options.path}`,
    `chown ${options.owner}:${options.owner} ${options.path}`,
    `unset RUNTIME_SECRET ADMIN_SECRET ${fields.map(([name]) => name).join(' ')}`,
  ];
}

/**
 * Verify lines for the `.env` file: every secret variable is present and
 * none is empty or the literal `null`.
 */
export function renderEnvFileChecks(path: string): string[] {
  return [
    ...Object.values(SECRET_ENV_VARS).map((name) => `grep -Eq '^${name}=.' ${path}`),
    `test -z "$(grep -E '^[A-Z0-9_]+=(null)?$' ${path})"`,
  ];
}
