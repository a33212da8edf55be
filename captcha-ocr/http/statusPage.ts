/**
 * The HTML status page served at GET /.
 */

export interface StatusPageInfo {
  baseUrl: string
  startedAt: Date
  maxContentLength: number
  ocrConcurrency: number
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

export function renderStatusPage(info: StatusPageInfo): string {
  const baseUrl = escapeHtml(info.baseUrl)
  const maxMb = (info.maxContentLength / 1024 / 1024).toFixed(1).replace(/\.0$/, '')

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Captcha OCR service</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 860px; margin: 0 auto; padding: 20px; color: #333; line-height: 1.6; }
    .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: #fff; padding: 1.5rem 2rem; border-radius: 10px; }
    .endpoint { background: #f8f9fa; padding: 1rem 1.5rem; margin: 1rem 0; border-radius: 8px; border-left: 4px solid #4caf50; }
    pre { background: #2d2d2d; color: #f8f8f2; padding: 1rem; border-radius: 5px; overflow-x: auto; }
    .badge { display: inline-block; padding: 2px 8px; background: #4caf50; color: #fff; border-radius: 12px; font-size: 12px; }
  </style>
</head>
<body>
  <div class="header">
    <h1>Captcha OCR service</h1>
    <p>Status: <strong>running</strong> since ${escapeHtml(info.startedAt.toISOString())}</p>
  </div>
  <p>Interactive API documentation and a test form live at <a href="/docs/">/docs/</a>.</p>
  <div class="endpoint">
    <h3><span class="badge">POST</span> /recognize</h3>
    <pre>curl -X POST ${baseUrl}/recognize \\
  -H "Content-Type: application/json" \\
  -d '{"base64": "data:image/png;base64,iVBORw0KGgo..."}'</pre>
  </div>
  <div class="endpoint">
    <h3><span class="badge">GET</span> /health</h3>
    <pre>curl ${baseUrl}/health</pre>
  </div>
  <ul>
    <li>Maximum request body: ${maxMb} MB</li>
    <li>Concurrent recognitions: ${info.ocrConcurrency}</li>
  </ul>
</body>
</html>
`
}
