import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';
import { Match, Template } from 'aws-cdk-lib/assertions';
import { AccessPolicy, INGRESS_RULES } from '../lib/access-policy';

describe('AccessPolicy', () => {
  let template: Template;

  beforeAll(() => {
    const stack = new cdk.Stack(new cdk.App(), 'PolicyStack');
    new AccessPolicy(stack, 'AccessPolicy', { vpc: new ec2.Vpc(stack, 'Vpc', { maxAzs: 1 }) });
    template = Template.fromStack(stack);
  });

  test('rule table is SSH, HTTP and HTTPS only', () => {
    expect(INGRESS_RULES.map((rule) => rule.port)).toEqual([22, 80, 443]);
  });

  test.each([
    { port: 22, description: 'Allow SSH' },
    { port: 80, description: 'Allow HTTP (redirects to HTTPS)' },
    { port: 443, description: 'Allow HTTPS' },
  ])('opens TCP $port to any IPv4 source', ({ port, description }) => {
    template.hasResourceProperties('AWS::EC2::SecurityGroup', {
      GroupDescription: 'Allow SSH, HTTP, HTTPS',
      SecurityGroupIngress: Match.arrayWith([
        { CidrIp: '0.0.0.0/0', Description: description, FromPort: port, IpProtocol: 'tcp', ToPort: port },
      ]),
    });
  });

  test('adds no rules outside the table', () => {
    const groups = template.findResources('AWS::EC2::SecurityGroup', {
      Properties: { GroupDescription: 'Allow SSH, HTTP, HTTPS' },
    });
    expect(Object.values(groups)[0].Properties.SecurityGroupIngress).toHaveLength(INGRESS_RULES.length);
  });
});
