import { N8N_PORT } from './compose';

/**
 * Nginx site for n8n. Certbot later adds the 443 server and the 80 -> 443
 * redirect to this same file.
 *
 * Upgrade/Connection are forwarded so the editor's WebSocket push connection
 * keeps working behind the proxy.
 */
export function renderProxySite(domainName: string, upstreamPort: number = N8N_PORT): string {
  return `server {
    listen 80;
    server_name ${domainName};

    location / {
        proxy_pass http://127.0.0.1:${upstreamPort};
        proxy_http_version 1.1;
        proxy_set_header Upgrade $http_upgrade;
        proxy_set_header Connection "upgrade";
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }
}`;
}
