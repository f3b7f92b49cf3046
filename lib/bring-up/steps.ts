import { ComposeOptions, renderComposeFile, renderEnvFileChecks, renderEnvFileCommands } from './compose';
import { renderProxySite } from './proxy';

export const ADMIN_LOGIN_USER = 'ubuntu';
export const APP_DIR = `/home/${ADMIN_LOGIN_USER}/n8n`;
export const COMPOSE_FILE = `${APP_DIR}/docker-compose.yml`;
export const ENV_FILE = `${APP_DIR}/.env`;
export const SITE_AVAILABLE = '/etc/nginx/sites-available/n8n';
export const SITE_ENABLED = '/etc/nginx/sites-enabled/n8n';
export const CONTAINER_NAME = 'n8n';

export const PACKAGES = [
  'docker.io',
  'docker-compose',
  'nginx',
  'certbot',
  'python3-certbot-nginx',
  'awscli',
  'jq',
];

/**
 * One unit of instance bring-up.
 *
 * `run` must be safe to execute again on an already configured host, and
 * `verify` must fail (non-zero) when the step's effect is not in place.
 * Both are plain shell lines executed under `set -e`.
 */
export interface BringUpStep {
  readonly id: string;
  readonly description: string;
  readonly run: string[];
  readonly verify: string[];
}

export interface BringUpOptions extends Omit<ComposeOptions, 'image'> {
  readonly n8nImage: string;
  readonly email: string;
  readonly region: string;
  readonly runtimeSecretArn: string;
  readonly adminSecretArn: string;
}

export function certificatePath(domainName: string): string {
  return `/etc/letsencrypt/live/${domainName}/fullchain.pem`;
}

/**
 * The ordered bring-up sequence for the n8n host.
 *
 * Certificate issuance does not wait for DNS to point at the Elastic IP; if
 * the record has not propagated yet the step fails and has to be re-run.
 */
export function bringUpSteps(options: BringUpOptions): BringUpStep[] {
  return [
    {
      id: 'install-packages',
      description: 'Install Docker, docker-compose, Nginx, Certbot and the AWS CLI',
      run: [
        'export DEBIAN_FRONTEND=noninteractive',
        'apt-get update',
        `apt-get install -y ${PACKAGES.join(' ')}`,
      ],
      verify: [
        'for bin in docker docker-compose nginx certbot aws jq; do',
        '  command -v "$bin" > /dev/null',
        'done',
      ],
    },
    {
      id: 'enable-docker',
      description: 'Start Docker now and on every boot',
      run: ['systemctl enable --now docker'],
      verify: ['systemctl is-enabled --quiet docker', 'systemctl is-active --quiet docker'],
    },
    {
      id: 'write-compose',
      description: 'Write docker-compose.yml and its .env file',
      run: [
        `mkdir -p ${APP_DIR}`,
        `cat > ${COMPOSE_FILE} <<'COMPOSE'`,
        renderComposeFile({ ...options, image: options.n8nImage }),
        'COMPOSE',
        ...renderEnvFileCommands({
          path: ENV_FILE,
          owner: ADMIN_LOGIN_USER,
          region: options.region,
          runtimeSecretArn: options.runtimeSecretArn,
          adminSecretArn: options.adminSecretArn,
        }),
      ],
      verify: [`test -s ${COMPOSE_FILE}`, ...renderEnvFileChecks(ENV_FILE)],
    },
    {
      id: 'start-container',
      description: 'Start the n8n container',
      run: [`cd ${APP_DIR}`, 'docker-compose up -d'],
      verify: [`test "$(docker inspect -f '{{.State.Running}}' ${CONTAINER_NAME})" = true`],
    },
    {
      id: 'write-proxy',
      description: 'Write the Nginx site for n8n',
      run: [`cat > ${SITE_AVAILABLE} <<'NGINX'`, renderProxySite(options.domainName), 'NGINX'],
      verify: [`test -s ${SITE_AVAILABLE}`],
    },
    {
      id: 'activate-proxy',
      description: 'Enable the Nginx site and reload Nginx',
      run: [`ln -sfn ${SITE_AVAILABLE} ${SITE_ENABLED}`, 'nginx -t', 'systemctl reload-or-restart nginx'],
      verify: [`test -L ${SITE_ENABLED}`, 'nginx -t'],
    },
    {
      id: 'issue-certificate',
      description: "Obtain and install a Let's Encrypt certificate with HTTP to HTTPS redirect",
      run: [
        'certbot --nginx --non-interactive --agree-tos --redirect --keep-until-expiring ' +
          `-d ${options.domainName} -m ${options.email}`,
      ],
      verify: [`test -s ${certificatePath(options.domainName)}`],
    },
    {
      id: 'grant-docker-group',
      description: `Let ${ADMIN_LOGIN_USER} manage containers without sudo`,
      run: [`usermod -aG docker ${ADMIN_LOGIN_USER}`],
      verify: [`id -nG ${ADMIN_LOGIN_USER} | tr ' ' '\\n' | grep -qx docker`],
    },
  ];
}
