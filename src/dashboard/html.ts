const STYLE = `
    :root {
      --bg: #0d1117; --surface: #161b22; --border: #30363d;
      --text: #e6edf3; --muted: #8b949e; --accent: #58a6ff; --green: #3fb950;
    }
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif; background: var(--bg); color: var(--text); }
    .header { padding: 20px 32px; border-bottom: 1px solid var(--border); display: flex; align-items: center; gap: 16px; }
    .header h1 { font-size: 20px; font-weight: 600; }
    .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(280px, 1fr)); gap: 16px; padding: 24px 32px; }
    .card { background: var(--surface); border: 1px solid var(--border); border-radius: 12px; padding: 20px; }
    .card h3 { font-size: 13px; color: var(--muted); text-transform: uppercase; letter-spacing: 0.5px; margin-bottom: 8px; }
    .stat { font-size: 36px; font-weight: 700; }
    .muted { color: var(--muted); font-size: 14px; margin-top: 4px; }
    form { display: flex; flex-direction: column; gap: 12px; max-width: 420px; }
    input { background: var(--bg); color: var(--text); border: 1px solid var(--border); border-radius: 6px; padding: 8px 12px; font-size: 14px; }
    button { background: var(--green); color: #fff; border: none; border-radius: 6px; padding: 8px 12px; font-size: 14px; cursor: pointer; }
    a { color: var(--accent); }`;

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}
  </style>
</head>
<body>
  <div class="header">
    <h1>Steward</h1>
    <span class="muted">${escapeHtml(title)}</span>
  </div>
${body}
</body>
</html>`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderDashboard(): string {
  return page(
    "Activity",
    `  <div class="grid">
    <div class="card"><h3>Pull requests</h3><div class="stat" id="prs">–</div><div class="muted" id="last-pr"></div></div>
    <div class="card"><h3>Issues</h3><div class="stat" id="issues">–</div><div class="muted" id="last-issue"></div></div>
  </div>
  <script>
    function describe(s) { return s ? 'Last: ' + s.repo + '#' + s.number + ' ' + s.title : 'Nothing yet'; }
    fetch('/dashboard/api/stats').then(function (r) { return r.json(); }).then(function (s) {
      document.getElementById('prs').textContent = s.totalPullRequests;
      document.getElementById('issues').textContent = s.totalIssues;
      document.getElementById('last-pr').textContent = describe(s.lastPullRequest);
      document.getElementById('last-issue').textContent = describe(s.lastIssue);
    });
  </script>`
  );
}

export function renderSetupPage(installationId: number): string {
  return page(
    "Setup",
    `  <div class="grid">
    <div class="card">
      <h3>Finish setup</h3>
      <p class="muted">Add an Anthropic API key for installation ${installationId}. Reviews start on the next pull request.</p>
      <br>
      <form method="post" action="/setup/save">
        <input type="hidden" name="installation_id" value="${installationId}">
        <input type="password" name="api_key" placeholder="API key" required autocomplete="off">
        <button type="submit">Save</button>
      </form>
    </div>
  </div>`
  );
}

export function renderSetupSuccess(): string {
  return page(
    "Setup complete",
    `  <div class="grid">
    <div class="card">
      <h3>All set</h3>
      <p class="muted">Your key is saved. Open or mark a pull request ready for review to get your first review.</p>
    </div>
  </div>`
  );
}
