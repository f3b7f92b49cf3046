import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';

/**
 * Operator-supplied values, one CloudFormation parameter each.
 *
 * None of the required parameters has a default, so CloudFormation refuses
 * to create the stack when any of them is missing or empty and no resource
 * is created. `DbPassword` and `EncryptionKey` are NoEcho and are only ever
 * consumed through `cdk.SecretValue.cfnParameter`.
 */
export interface OperatorParameters {
  readonly keyName: cdk.CfnParameter;
  readonly domainName: cdk.CfnParameter;
  readonly email: cdk.CfnParameter;
  readonly ubuntuAmi: cdk.CfnParameter;
  readonly encryptionKey: cdk.CfnParameter;
  readonly dbPassword: cdk.CfnParameter;
  readonly dbHost: cdk.CfnParameter;
  readonly dbUser: cdk.CfnParameter;
}

export const DOMAIN_NAME_PATTERN =
  '^(?=.{1,253}$)([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\\.)+[a-zA-Z]{2,63}$';
export const EMAIL_PATTERN = '^[^@\\s]+@[^@\\s]+\\.[^@\\s]+$';

export const PARAMETER_GROUPS = [
  { label: 'Instance', parameters: ['KeyName', 'UbuntuAmi'] },
  { label: 'Domain and TLS', parameters: ['DomainName', 'Email'] },
  { label: 'Database', parameters: ['DbHost', 'DbUser', 'DbPassword'] },
  { label: 'n8n', parameters: ['EncryptionKey'] },
];

export function declareOperatorParameters(
  scope: Construct,
  ubuntuAmiParameter: string
): OperatorParameters {
  const keyName = new cdk.CfnParameter(scope, 'KeyName', {
    type: 'AWS::EC2::KeyPair::KeyName',
    description: 'Existing EC2 KeyPair for SSH',
    constraintDescription: 'must be the name of an existing EC2 KeyPair',
  });

  const domainName = new cdk.CfnParameter(scope, 'DomainName', {
    type: 'String',
    description: 'Domain name pointing to this EC2 instance (e.g., n8n.example.com)',
    minLength: 1,
    allowedPattern: DOMAIN_NAME_PATTERN,
    constraintDescription: 'must be a fully qualified domain name such as n8n.example.com',
  });

  const email = new cdk.CfnParameter(scope, 'Email', {
    type: 'String',
    description: "Email for Let's Encrypt registration and expiry notices",
    minLength: 1,
    allowedPattern: EMAIL_PATTERN,
    constraintDescription: 'must be a valid email address',
  });

  const ubuntuAmi = new cdk.CfnParameter(scope, 'UbuntuAmi', {
    type: 'AWS::SSM::Parameter::Value<AWS::EC2::Image::Id>',
    description: 'Latest Ubuntu 22.04 LTS AMI (auto-resolved)',
    default: ubuntuAmiParameter,
  });

  const encryptionKey = new cdk.CfnParameter(scope, 'EncryptionKey', {
    type: 'String',
    description: 'Long random string used by n8n to encrypt credentials in the database',
    noEcho: true,
    minLength: 16,
    constraintDescription: 'must be at least 16 characters',
  });

  const dbPassword = new cdk.CfnParameter(scope, 'DbPassword', {
    type: 'String',
    description: 'PostgreSQL password for n8n',
    noEcho: true,
    minLength: 1,
  });

  const dbHost = new cdk.CfnParameter(scope, 'DbHost', {
    type: 'String',
    description: 'Hostname of your PostgreSQL server (e.g. Supabase or RDS endpoint)',
    minLength: 1,
  });

  const dbUser = new cdk.CfnParameter(scope, 'DbUser', {
    type: 'String',
    description: 'PostgreSQL username for n8n',
    minLength: 1,
  });

  return { keyName, domainName, email, ubuntuAmi, encryptionKey, dbPassword, dbHost, dbUser };
}
