import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { Construct } from 'constructs';

export interface IngressRule {
  readonly port: number;
  readonly description: string;
}

/**
 * Inbound allow-list for the n8n host. Not configurable.
 *
 * The n8n port itself is left out so every request goes through Nginx.
 */
export const INGRESS_RULES: readonly IngressRule[] = [
  { port: 22, description: 'Allow SSH' },
  { port: 80, description: 'Allow HTTP (redirects to HTTPS)' },
  { port: 443, description: 'Allow HTTPS' },
];

export interface AccessPolicyProps {
  readonly vpc: ec2.IVpc;
}

export class AccessPolicy extends Construct {
  public readonly securityGroup: ec2.SecurityGroup;

  constructor(scope: Construct, id: string, props: AccessPolicyProps) {
    super(scope, id);

    this.securityGroup = new ec2.SecurityGroup(this, 'SecurityGroup', {
      vpc: props.vpc,
      description: 'Allow SSH, HTTP, HTTPS',
      allowAllOutbound: true,
    });

    for (const rule of INGRESS_RULES) {
      this.securityGroup.addIngressRule(ec2.Peer.anyIpv4(), ec2.Port.tcp(rule.port), rule.description);
    }
  }
}
