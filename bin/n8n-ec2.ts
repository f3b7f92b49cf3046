#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { N8nEc2Stack } from '../lib/n8n-ec2-stack';

/**
 * n8n on EC2
 *
 * Deploys a single Ubuntu instance running n8n:
 * - Docker + docker-compose (n8n container, PostgreSQL backend)
 * - Nginx reverse proxy with WebSocket support
 * - Let's Encrypt certificate via Certbot, HTTP redirected to HTTPS
 * - Elastic IP for a stable DNS A-record
 *
 * Settings (instanceType, n8nImage, dbPort, dbName, adminUser, timezone,
 * ubuntuAmiParameter) come from cdk.json or `-c key=value`. Secrets and
 * per-deployment values are CloudFormation parameters:
 *
 *   cdk deploy --parameters DomainName=n8n.example.com --parameters KeyName=... ...
 */

const app = new cdk.App();

new N8nEc2Stack(app, 'N8nEc2Stack', {
  env: {
    region: process.env.CDK_DEFAULT_REGION,
    account: process.env.CDK_DEFAULT_ACCOUNT,
  },
  description: 'n8n on EC2 with HTTPS (Nginx + Certbot), Elastic IP and PostgreSQL',
});

app.synth();
