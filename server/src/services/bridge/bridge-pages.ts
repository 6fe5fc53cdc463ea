/**
 * Browser-facing pages for the login bridge.
 * The browser never sees the login result; it only learns that it can go
 * back to the launcher.
 */

export interface BridgePage {
  status: number;
  html: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderPage(title: string, heading: string, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>${escapeHtml(title)}</title>
    <style>
      body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 480px; margin: 80px auto; padding: 20px; color: #333; text-align: center; }
      h1 { font-size: 22px; }
      p { color: #666; }
    </style>
  </head>
  <body>
    <h1>${escapeHtml(heading)}</h1>
    <p>${escapeHtml(message)}</p>
  </body>
</html>
`;
}

export function renderConfirmationPage(): BridgePage {
  return {
    status: 200,
    html: renderPage(
      'Sign-in complete',
      'You can close this window',
      'Return to your launcher to continue.'
    ),
  };
}

export function renderErrorPage(status: number, message: string): BridgePage {
  return {
    status,
    html: renderPage('Sign-in failed', 'Something went wrong', message),
  };
}
