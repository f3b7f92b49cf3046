import { buildProvisioningResult } from '../lib/outputs';

describe('buildProvisioningResult', () => {
  const result = buildProvisioningResult({
    staticIp: '203.0.113.10',
    domainName: 'n8n.example.com',
    keyName: 'n8n-key',
    adminSecretArn: 'arn:aws:secretsmanager:us-east-1:123456789012:secret:admin',
    region: 'us-east-1',
  });

  test('access URL is https on the domain', () => {
    expect(result.accessUrl).toBe('https://n8n.example.com');
  });

  test('SSH command logs in as ubuntu at the static IP', () => {
    expect(result.sshCommand).toBe('ssh -i <path-to-n8n-key.pem> ubuntu@203.0.113.10');
    expect(result.sshCommand).toContain('ubuntu@203.0.113.10');
  });

  test('static IP is reported as given', () => {
    expect(result.staticIp).toBe('203.0.113.10');
    expect(result.sshCommand.endsWith(`@${result.staticIp}`)).toBe(true);
  });

  test('admin credentials are only reachable through Secrets Manager', () => {
    expect(result.adminCredentialsCommand).toBe(
      'aws secretsmanager get-secret-value --secret-id arn:aws:secretsmanager:us-east-1:123456789012:secret:admin ' +
        '--region us-east-1 --query SecretString --output text'
    );
  });
});
