import Joi from 'joi';
import { Construct } from 'constructs';

/**
 * Canonical publishes Ubuntu AMI IDs to AWS SSM Parameter Store.
 * See: https://ubuntu.com/server/docs/cloud-images/amazon-ec2
 */
export const DEFAULT_UBUNTU_AMI_PARAMETER =
  '/aws/service/canonical/ubuntu/server/22.04/stable/current/amd64/hvm/ebs-gp2/ami-id';

/**
 * Synth-time settings read from the CDK context (`cdk.json` or `-c key=value`).
 *
 * Everything here is safe to commit; secrets are CloudFormation parameters
 * and never pass through the context.
 */
export interface DeploymentSettings {
  /** EC2 instance type in `class.size` form */
  instanceType: string;
  /** Container image for the n8n service */
  n8nImage: string;
  /** PostgreSQL port on the database host */
  dbPort: number;
  /** PostgreSQL database name */
  dbName: string;
  /** Basic-auth login; the password is generated into Secrets Manager */
  adminUser: string;
  /** Timezone handed to n8n for scheduled workflows */
  timezone: string;
  /** SSM parameter path used as the default for the UbuntuAmi parameter */
  ubuntuAmiParameter: string;
}

export const SETTINGS_KEYS = [
  'instanceType',
  'n8nImage',
  'dbPort',
  'dbName',
  'adminUser',
  'timezone',
  'ubuntuAmiParameter',
] as const satisfies readonly (keyof DeploymentSettings)[];

export class ConfigurationError extends Error {
  constructor(public readonly details: string[]) {
    super(`Invalid deployment settings:\n${details.map((d) => `- ${d}`).join('\n')}`);
    this.name = 'ConfigurationError';
  }
}

const settingsSchema = Joi.object<DeploymentSettings>({
  instanceType: Joi.string()
    .pattern(/^[a-z][a-z0-9-]*\.[a-z0-9]+$/)
    .default('t2.micro')
    .messages({
      'string.pattern.base': 'instanceType must look like "t2.micro"',
    }),
  n8nImage: Joi.string()
    .pattern(/^\S+$/)
    .default('n8nio/n8n:latest')
    .messages({
      'string.pattern.base': 'n8nImage must not contain whitespace',
      'string.empty': 'n8nImage must not be empty',
    }),
  dbPort: Joi.number()
    .integer()
    .min(1)
    .max(65535)
    .default(5432)
    .messages({
      'number.base': 'dbPort must be a number',
      'number.integer': 'dbPort must be an integer',
      'number.min': 'dbPort must be between 1 and 65535',
      'number.max': 'dbPort must be between 1 and 65535',
    }),
  dbName: Joi.string()
    .pattern(/^[A-Za-z_][A-Za-z0-9_]*$/)
    .default('postgres')
    .messages({
      'string.pattern.base': 'dbName must be a plain SQL identifier',
    }),
  adminUser: Joi.string()
    .pattern(/^[A-Za-z0-9_.-]+$/)
    .default('admin')
    .messages({
      'string.pattern.base': 'adminUser may only contain letters, digits, ".", "_" and "-"',
    }),
  timezone: Joi.string()
    .pattern(/^(UTC|[A-Za-z]+(\/[A-Za-z0-9_+-]+)+)$/)
    .default('UTC')
    .messages({
      'string.pattern.base': 'timezone must be "UTC" or an Area/City name',
    }),
  ubuntuAmiParameter: Joi.string()
    .pattern(/^\/\S+$/)
    .default(DEFAULT_UBUNTU_AMI_PARAMETER)
    .messages({
      'string.pattern.base': 'ubuntuAmiParameter must be an SSM parameter path starting with "/"',
    }),
}).unknown(false);

/**
 * Validate raw settings and fill in defaults.
 * Numeric strings are accepted because `cdk -c` passes every value as a string.
 */
export function parseDeploymentSettings(raw: Record<string, unknown>): DeploymentSettings {
  const { error, value } = settingsSchema.validate(raw, { abortEarly: false, convert: true });
  if (error) {
    throw new ConfigurationError(error.details.map((detail) => detail.message));
  }
  return value;
}

/**
 * Read the deployment settings from the construct tree's context.
 */
export function loadDeploymentSettings(scope: Construct): DeploymentSettings {
  const raw: Record<string, unknown> = {};
  for (const key of SETTINGS_KEYS) {
    const contextValue: unknown = scope.node.tryGetContext(key);
    if (contextValue !== undefined) {
      raw[key] = contextValue;
    }
  }
  return parseDeploymentSettings(raw);
}
