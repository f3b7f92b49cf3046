export interface ResultInputs {
  readonly staticIp: string;
  readonly domainName: string;
  readonly keyName: string;
  readonly adminSecretArn: string;
  readonly region: string;
}

export interface ProvisioningResult {
  readonly staticIp: string;
  readonly sshCommand: string;
  readonly accessUrl: string;
  readonly adminCredentialsCommand: string;
}

/**
 * Turn created values into the strings reported to the operator.
 * Inputs may be CDK tokens; the projection is the same either way.
 */
export function buildProvisioningResult(inputs: ResultInputs): ProvisioningResult {
  return {
    staticIp: inputs.staticIp,
    sshCommand: `ssh -i <path-to-${inputs.keyName}.pem> ubuntu@${inputs.staticIp}`,
    accessUrl: `https://${inputs.domainName}`,
    adminCredentialsCommand:
      `aws secretsmanager get-secret-value --secret-id ${inputs.adminSecretArn} ` +
      `--region ${inputs.region} --query SecretString --output text`,
  };
}
