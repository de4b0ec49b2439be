/**
 * Demo web app supervised by the harness.
 *
 * Usage:  npm run demo
 * Opens:  http://localhost:5001
 *
 * The page's button requests /aroute and renders the result into an element
 * that does not exist, so clicking it produces a browser console error.
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { fileURLToPath } from 'url';

const PAGE_TITLE = 'Example Web App';

export function renderIndex(): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${PAGE_TITLE}</title>
</head>
<body>
  <main>
    <h1>${PAGE_TITLE}</h1>
    <p>To show how you can control it with MCP</p>
    <ol>
      <li>Register the harness with your MCP client: <code>node dist/src/mcp-server.js</code></li>
      <li>Ask the agent to start the app, press the button and read the browser console log</li>
    </ol>
    <button id="broken-button" type="button">Example Broken Button</button>
  </main>
  <script>
    document.getElementById('broken-button').addEventListener('click', function () {
      console.log('Loading /aroute');
      fetch('/aroute')
        .then(function (res) { return res.text(); })
        .then(function (html) { document.querySelector('#broken-content').innerHTML = html; })
        .catch(function (err) { console.error('Failed to render /aroute: ' + err.message); });
    });
  </script>
</body>
</html>
`;
}

export function renderFragment(): string {
  return '<div>Something went wrong</div>';
}

export interface DemoResponse {
  status: number;
  contentType: string;
  body: string;
}

export function route(method: string, url: string): DemoResponse {
  const { pathname } = new URL(url, 'http://localhost');
  if (method === 'GET' && pathname === '/') {
    return { status: 200, contentType: 'text/html; charset=utf-8', body: renderIndex() };
  }
  if (method === 'GET' && pathname === '/aroute') {
    return { status: 200, contentType: 'text/html; charset=utf-8', body: renderFragment() };
  }
  return { status: 404, contentType: 'text/plain; charset=utf-8', body: 'Not Found' };
}

function handle(req: IncomingMessage, res: ServerResponse): void {
  const method = req.method ?? 'GET';
  const url = req.url ?? '/';
  const response = route(method, url);
  res.writeHead(response.status, { 'Content-Type': response.contentType });
  res.end(response.body);
  console.log(`${method} ${url} ${response.status}`);
}

export function startDemoApp(host: string, port: number) {
  const server = createServer(handle);
  server.listen(port, host, () => {
    console.log(`Demo app listening on http://${host}:${port}`);
  });
  return server;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const host = process.env.APP_HOST ?? 'localhost';
  const port = parseInt(process.env.APP_PORT ?? '5001', 10);
  const server = startDemoApp(host, port);

  const close = () => {
    server.close(() => process.exit(0));
    server.closeAllConnections();
  };
  process.on('SIGTERM', close);
  process.on('SIGINT', close);
}
