import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import { AccessPolicy } from './access-policy';
import { BringUpStep, LOG_FILE, RUNNER_PATH, bringUpSteps, createBringUpUserData } from './bring-up';
import { DeploymentSettings, loadDeploymentSettings } from './config';
import { buildProvisioningResult } from './outputs';
import { OperatorParameters, PARAMETER_GROUPS, declareOperatorParameters } from './parameters';

export interface N8nEc2StackProps extends cdk.StackProps {
  /** Defaults to the settings found in the CDK context */
  settings?: DeploymentSettings;
}

/**
 * Machine image whose id comes from a CloudFormation parameter, so the
 * operator can override the auto-resolved Ubuntu AMI at deploy time.
 */
class ParameterMachineImage implements ec2.IMachineImage {
  constructor(private readonly imageId: string) {}

  public getImage(_scope: Construct): ec2.MachineImageConfig {
    return {
      imageId: this.imageId,
      osType: ec2.OperatingSystemType.LINUX,
      userData: ec2.UserData.forLinux(),
    };
  }
}

/**
 * n8n on EC2 Stack
 *
 * One Ubuntu instance running n8n in Docker behind Nginx, with a
 * Let's Encrypt certificate and an Elastic IP:
 *
 *   Internet ──► SG (22/80/443) ──► Nginx :80/:443 ──► n8n 127.0.0.1:5678 ──► PostgreSQL
 *
 * The database is external (Supabase, RDS, ...). Secrets are passed as NoEcho
 * parameters, kept in Secrets Manager and fetched by the instance at boot.
 */
export class N8nEc2Stack extends cdk.Stack {
  public readonly settings: DeploymentSettings;
  public readonly parameters: OperatorParameters;
  public readonly securityGroup: ec2.SecurityGroup;
  public readonly runtimeSecret: secretsmanager.Secret;
  public readonly adminSecret: secretsmanager.Secret;
  public readonly steps: BringUpStep[];
  public readonly instance: ec2.Instance;
  public readonly staticIp: ec2.CfnEIP;

  constructor(scope: Construct, id: string, props?: N8nEc2StackProps) {
    super(scope, id, props);

    this.settings = props?.settings ?? loadDeploymentSettings(this);

    // ============================================================
    // Parameters
    // ============================================================
    this.parameters = declareOperatorParameters(this, this.settings.ubuntuAmiParameter);
    this.templateOptions.metadata = {
      'AWS::CloudFormation::Interface': {
        ParameterGroups: PARAMETER_GROUPS.map((group) => ({
          Label: { default: group.label },
          Parameters: group.parameters,
        })),
      },
    };

    // ============================================================
    // VPC Configuration
    // ============================================================
    // Single public subnet, no NAT: the instance is reached through its EIP
    const vpc = new ec2.Vpc(this, 'Vpc', {
      maxAzs: 1,
      natGateways: 0,
      subnetConfiguration: [
        {
          name: 'Public',
          subnetType: ec2.SubnetType.PUBLIC,
          cidrMask: 24,
        },
      ],
    });

    // ============================================================
    // Security Group
    // ============================================================
    this.securityGroup = new AccessPolicy(this, 'AccessPolicy', { vpc }).securityGroup;

    // ============================================================
    // Secrets
    // ============================================================
    this.runtimeSecret = new secretsmanager.Secret(this, 'RuntimeSecret', {
      description: 'n8n database password and encryption key',
      secretObjectValue: {
        dbPassword: cdk.SecretValue.cfnParameter(this.parameters.dbPassword),
        encryptionKey: cdk.SecretValue.cfnParameter(this.parameters.encryptionKey),
      },
    });

    // Generated at deploy time instead of a fixed default login
    this.adminSecret = new secretsmanager.Secret(this, 'AdminCredentials', {
      description: 'n8n basic-auth credentials',
      generateSecretString: {
        secretStringTemplate: JSON.stringify({ username: this.settings.adminUser }),
        generateStringKey: 'password',
        excludePunctuation: true,
        passwordLength: 24,
      },
    });

    // ============================================================
    // IAM Role for EC2
    // ============================================================
    const role = new iam.Role(this, 'InstanceRole', {
      assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
      description: 'Role for the n8n instance with SSM and secret read access',
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSSMManagedInstanceCore'),
      ],
    });
    this.runtimeSecret.grantRead(role);
    this.adminSecret.grantRead(role);

    // ============================================================
    // Bring-up (User Data)
    // ============================================================
    const domainName = this.parameters.domainName.valueAsString;

    this.steps = bringUpSteps({
      domainName,
      email: this.parameters.email.valueAsString,
      dbHost: this.parameters.dbHost.valueAsString,
      dbUser: this.parameters.dbUser.valueAsString,
      dbPort: this.settings.dbPort,
      dbName: this.settings.dbName,
      adminUser: this.settings.adminUser,
      timezone: this.settings.timezone,
      n8nImage: this.settings.n8nImage,
      region: this.region,
      runtimeSecretArn: this.runtimeSecret.secretArn,
      adminSecretArn: this.adminSecret.secretArn,
    });

    // ============================================================
    // EC2 Instance
    // ============================================================
    this.instance = new ec2.Instance(this, 'N8nInstance', {
      vpc,
      vpcSubnets: { subnetType: ec2.SubnetType.PUBLIC },
      securityGroup: this.securityGroup,
      role,
      keyPair: ec2.KeyPair.fromKeyPairName(this, 'KeyPair', this.parameters.keyName.valueAsString),
      instanceType: new ec2.InstanceType(this.settings.instanceType),
      machineImage: new ParameterMachineImage(this.parameters.ubuntuAmi.valueAsString),
      blockDevices: [
        {
          deviceName: '/dev/sda1',
          volume: ec2.BlockDeviceVolume.ebs(20, {
            volumeType: ec2.EbsDeviceVolumeType.GP3,
            encrypted: true,
            deleteOnTermination: true,
          }),
        },
      ],
      userData: createBringUpUserData(this.steps),
    });

    // ============================================================
    // Elastic IP
    // ============================================================
    // Stays bound until the instance is replaced; re-association is manual
    this.staticIp = new ec2.CfnEIP(this, 'ElasticIp', {
      domain: 'vpc',
      instanceId: this.instance.instanceId,
    });

    // ============================================================
    // Synth-time warnings
    // ============================================================
    const annotations = cdk.Annotations.of(this);
    annotations.addWarningV2(
      'n8n-ec2:certificate-dns-race',
      'The issue-certificate step runs at first boot without waiting for DomainName to resolve to the Elastic IP. ' +
        `If the DNS record is not in place yet, run "sudo ${RUNNER_PATH} issue-certificate" once it is.`
    );
    annotations.addWarningV2(
      'n8n-ec2:boot-status-not-reported',
      `Stack creation does not wait for the bring-up script; check ${LOG_FILE} for its result.`
    );
    annotations.addWarningV2(
      'n8n-ec2:ssh-open',
      'SSH (22) is open to 0.0.0.0/0.'
    );

    // ============================================================
    // Outputs
    // ============================================================
    const result = buildProvisioningResult({
      staticIp: this.staticIp.ref,
      domainName,
      keyName: this.parameters.keyName.valueAsString,
      adminSecretArn: this.adminSecret.secretArn,
      region: this.region,
    });

    new cdk.CfnOutput(this, 'StaticIP', {
      value: result.staticIp,
      description: 'Static Elastic IP to use in your DNS A-record',
    });

    new cdk.CfnOutput(this, 'SSHCommand', {
      value: result.sshCommand,
      description: 'SSH access command (replace the placeholder with your key file)',
    });

    new cdk.CfnOutput(this, 'AccessURL', {
      value: result.accessUrl,
      description: 'Your secure n8n URL',
    });

    new cdk.CfnOutput(this, 'InstanceId', {
      value: this.instance.instanceId,
      description: 'EC2 Instance ID',
    });

    new cdk.CfnOutput(this, 'AdminCredentialsSecretArn', {
      value: this.adminSecret.secretArn,
      description: 'Secrets Manager secret holding the n8n login',
    });

    new cdk.CfnOutput(this, 'GetAdminPasswordCommand', {
      value: result.adminCredentialsCommand,
      description: 'Command to read the n8n login from Secrets Manager',
    });
  }
}
