import * as cdk from 'aws-cdk-lib/core';
import {
  ConfigurationError,
  DEFAULT_UBUNTU_AMI_PARAMETER,
  loadDeploymentSettings,
  parseDeploymentSettings,
} from '../lib/config';

describe('parseDeploymentSettings', () => {
  test('fills in defaults for an empty context', () => {
    expect(parseDeploymentSettings({})).toEqual({
      instanceType: 't2.micro',
      n8nImage: 'n8nio/n8n:latest',
      dbPort: 5432,
      dbName: 'postgres',
      adminUser: 'admin',
      timezone: 'UTC',
      ubuntuAmiParameter: DEFAULT_UBUNTU_AMI_PARAMETER,
    });
  });

  test('converts numeric strings passed with -c', () => {
    expect(parseDeploymentSettings({ dbPort: '6543' }).dbPort).toBe(6543);
  });

  test('accepts Area/City timezones', () => {
    expect(parseDeploymentSettings({ timezone: 'America/Mexico_City' }).timezone).toBe('America/Mexico_City');
  });

  test('rejects a malformed instance type', () => {
    expect(() => parseDeploymentSettings({ instanceType: 't2 micro' })).toThrow(
      'Invalid deployment settings:\n- instanceType must look like "t2.micro"'
    );
  });

  test('reports every violation at once', () => {
    let caught: unknown;
    try {
      parseDeploymentSettings({ dbPort: 0, timezone: 'nowhere' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    if (caught instanceof ConfigurationError) {
      expect(caught.details).toEqual([
        'dbPort must be between 1 and 65535',
        'timezone must be "UTC" or an Area/City name',
      ]);
    }
  });

  test('rejects unknown keys', () => {
    expect(() => parseDeploymentSettings({ sshCidr: '10.0.0.0/8' })).toThrow(ConfigurationError);
  });

  test('rejects a non-numeric port', () => {
    expect(() => parseDeploymentSettings({ dbPort: 'abc' })).toThrow('dbPort must be a number');
  });

  test('rejects an SSM path without a leading slash', () => {
    expect(() => parseDeploymentSettings({ ubuntuAmiParameter: 'aws/service/ami' })).toThrow(
      'ubuntuAmiParameter must be an SSM parameter path starting with "/"'
    );
  });
});

describe('loadDeploymentSettings', () => {
  test('reads only known keys from the context', () => {
    const app = new cdk.App({
      context: { adminUser: 'owner', dbPort: '6543', unrelated: 'ignored' },
    });
    const settings = loadDeploymentSettings(app);
    expect(settings.adminUser).toBe('owner');
    expect(settings.dbPort).toBe(6543);
    expect(settings.instanceType).toBe('t2.micro');
  });
});

describe('ConfigurationError', () => {
  test('lists the details in its message', () => {
    const error = new ConfigurationError(['first problem', 'second problem']);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Invalid deployment settings:\n- first problem\n- second problem');
  });
});
