/**
 * HTML Generator - renders the report document as one self-contained page
 *
 * The page carries its styles, its script and the report data inline. Cards are
 * rendered on the server so the content is readable with scripts disabled; the
 * client script then re-renders them from the embedded JSON as filters change.
 */

import type { EndpointGroup, RenderOptions, ReportDocument, TestCaseRecord } from '../types';
import { escapeHtml, serializeForScript } from '../utils/sanitizers';
import { formatCount, formatDuration, formatTimestamp } from '../utils/formatters';
import { tryToCurl } from './curl-generator';
import { generateClientScript } from './client-script';

const FAVICON_SVG = `<svg xmlns="http://www.w3.org/2000/svg" width="32" height="32" viewBox="0 0 32 32">` +
  `<rect width="32" height="32" rx="6" fill="#2563eb"/>` +
  `<path d="M10 12h12M10 16h9M10 20h6" stroke="#fff" stroke-width="2" stroke-linecap="round"/>` +
  `<circle cx="23" cy="21" r="4" fill="#ef4444"/></svg>`;

const FAVICON_HREF = `data:image/svg+xml,${encodeURIComponent(FAVICON_SVG)}`;

function pillClass(code: number | undefined): string {
  if (code === undefined) return 'pill-unk';
  if (code >= 500 && code < 600) return 'pill-5xx';
  if (code >= 400 && code < 500) return 'pill-4xx';
  if (code >= 200 && code < 300) return 'pill-2xx';
  return 'pill-unk';
}

/**
 * Generate a single failure card
 */
export function generateFailureCard(record: TestCaseRecord, idx: number): string {
  const curl = tryToCurl(record);
  const code = record.statusCode !== undefined ? String(record.statusCode) : 'n/a';

  return `
        <article class="failure-card status-${record.statusCodeClass}" data-idx="${idx}" tabindex="0">
          <div class="card-top">
            <span class="pill ${pillClass(record.statusCode)}">${code}</span>
            <span class="status-tag">${record.status}</span>
            ${record.kind ? `<span class="card-kind">${escapeHtml(record.kind)}</span>` : ''}
            <span class="card-duration">${record.durationSeconds.toFixed(3)}s</span>
          </div>
          <div class="card-test">${escapeHtml(record.testName)}</div>
          <div class="card-suite">${escapeHtml(record.suiteName)}</div>
          <p class="card-message">${escapeHtml(record.message)}</p>
          <details class="card-details">
            <summary>Full failure text</summary>
            <pre>${escapeHtml(record.fullText)}</pre>
            ${curl ? `<pre class="curl-snippet">${escapeHtml(curl)}</pre>` : ''}
          </details>
        </article>`;
}

/**
 * Generate the grouped card list shown before the client script takes over
 */
export function generateGroups(groups: EndpointGroup[]): string {
  let idx = 0;
  return groups.map(group => `
      <section class="endpoint-group">
        <header class="group-header">
          <span class="group-endpoint">${escapeHtml(group.endpoint)}</span>
          <span class="group-count">${group.count}</span>
        </header>
        <div class="card-grid">${group.records.map(record => generateFailureCard(record, idx++)).join('')}
        </div>
      </section>`).join('');
}

function generateSummary(document: ReportDocument): string {
  const { summary } = document;
  const baseUrls = summary.baseUrls.length > 0
    ? `<div class="base-urls">${summary.baseUrls.map(url => `<span class="url-badge">${escapeHtml(url)}</span>`).join('')}</div>`
    : '';

  return `
    <div class="summary">
      <div class="stat-card"><div class="stat-value">${summary.totalFailed}</div><div class="stat-label">Failures</div></div>
      <div class="stat-card stat-5xx"><div class="stat-value">${summary.count5xx}</div><div class="stat-label">5xx</div></div>
      <div class="stat-card stat-4xx"><div class="stat-value">${summary.count4xx}</div><div class="stat-label">4xx</div></div>
      <div class="stat-card"><div class="stat-value">${summary.countOther}</div><div class="stat-label">Other</div></div>
      <div class="stat-card"><div class="stat-value">${formatDuration(summary.maxDuration)}</div><div class="stat-label">Slowest</div></div>
      <div class="stat-card"><div class="stat-value">${document.groups.length}</div><div class="stat-label">Endpoints</div></div>
    </div>
    ${baseUrls}`;
}

/**
 * Render the complete HTML document
 */
export function render(document: ReportDocument, options: RenderOptions = {}): string {
  const theme = options.theme ?? 'dark';
  const { summary } = document;

  const payload = serializeForScript({
    title: document.title,
    generatedAt: document.generatedAt,
    summary,
    groups: document.groups.map(group => ({
      endpoint: group.endpoint,
      count: group.count,
      records: group.records,
    })),
  });

  const sourceLine = document.sourceFile
    ? `<span>Source: <code>${escapeHtml(document.sourceFile)}</code></span>`
    : '';

  return `<!DOCTYPE html>
<html lang="en" class="${theme === 'light' ? 'light' : ''}" data-default-theme="${theme}">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(document.title)}</title>
  <link rel="icon" type="image/svg+xml" href="${FAVICON_HREF}">
  <style>
${generateStyles()}
  </style>
</head>
<body>
  <header class="top-bar">
    <div>
      <h1>${escapeHtml(document.title)}</h1>
      <div class="meta">
        <span>Generated ${escapeHtml(formatTimestamp(document.generatedAt))}</span>
        ${sourceLine}
        <span>${formatCount(summary.totalFailed, 'failure')} across ${formatCount(document.groups.length, 'endpoint')}</span>
      </div>
    </div>
    <button class="btn" id="theme-toggle" type="button">${theme === 'light' ? 'Dark theme' : 'Light theme'}</button>
  </header>

  <main>
    ${generateSummary(document)}

    <div class="toolbar" role="search">
      <div class="filter-group">
        <button class="filter-btn active" type="button" data-mode="all">All</button>
        <button class="filter-btn" type="button" data-mode="5xx">5xx</button>
        <button class="filter-btn" type="button" data-mode="4xx">4xx</button>
      </div>
      <input class="search-input" id="search" type="search" placeholder="Search endpoint or suite..." aria-label="Search endpoint or suite">
      <label class="duration-filter">
        <span>Duration</span>
        <input type="range" id="duration-filter" min="${summary.minDuration}" max="${summary.maxDuration}" step="any" value="${summary.maxDuration}">
        <span id="duration-value"></span>
      </label>
      <button class="btn" id="reset-filters" type="button">Reset</button>
      <span class="visible-count" id="visible-count">Showing ${summary.totalFailed} of ${summary.totalFailed} failures</span>
    </div>

    <div id="groups">${generateGroups(document.groups)}
    </div>
    <div class="empty-state" id="empty-state" style="display: ${summary.totalFailed === 0 ? 'block' : 'none'};">No failures match.</div>
  </main>

  <div id="modal-backdrop" role="dialog" aria-modal="true" aria-labelledby="modal-title">
    <div id="modal">
      <div class="modal-header">
        <div id="modal-title"></div>
        <button class="btn" id="modal-close" type="button">Close</button>
      </div>
      <div id="modal-meta"></div>
      <pre id="modal-full-text"></pre>
      <pre id="modal-curl" class="curl-snippet"></pre>
      <button class="btn btn-copy" id="modal-copy-curl" type="button">Copy curl</button>
    </div>
  </div>
  <div id="toast" role="status"></div>

  <script type="application/json" id="report-data">${payload}</script>
  <script>
${generateClientScript()}
  </script>
</body>
</html>`;
}

/**
 * Generate all CSS styles (dark by default, light under html.light)
 */
function generateStyles(): string {
  return `    :root {
      --bg: #0a0e1a;
      --bg-alt: #111827;
      --bg-card: #161e2e;
      --text: #f3f4f6;
      --text-muted: #9ca3af;
      --border: #1f2937;
      --accent: #3b82f6;
      --red: #f87171;
      --amber: #fbbf24;
      --green: #34d399;
      --shadow: 0 4px 6px -1px rgba(0, 0, 0, 0.4);
      --mono: ui-monospace, SFMono-Regular, 'SF Mono', Menlo, Consolas, 'Liberation Mono', monospace;
    }

    html.light {
      --bg: #f8fafc;
      --bg-alt: #ffffff;
      --bg-card: #ffffff;
      --text: #0f172a;
      --text-muted: #64748b;
      --border: #e2e8f0;
      --accent: #2563eb;
      --red: #dc2626;
      --amber: #d97706;
      --green: #059669;
      --shadow: 0 4px 6px -1px rgba(0, 0, 0, 0.08);
    }

    * { box-sizing: border-box; }
    body {
      margin: 0;
      padding: 24px;
      background: var(--bg);
      color: var(--text);
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif;
      line-height: 1.5;
    }
    h1 { margin: 0 0 4px; font-size: 1.5rem; }
    code, pre { font-family: var(--mono); }

    .top-bar { display: flex; justify-content: space-between; align-items: flex-start; gap: 16px; margin-bottom: 24px; }
    .meta { display: flex; flex-wrap: wrap; gap: 16px; font-size: 0.8rem; color: var(--text-muted); }

    .summary { display: grid; grid-template-columns: repeat(auto-fit, minmax(130px, 1fr)); gap: 12px; margin-bottom: 16px; }
    .stat-card { background: var(--bg-alt); border: 1px solid var(--border); border-radius: 10px; padding: 14px; text-align: center; }
    .stat-value { font-size: 1.6rem; font-weight: 700; }
    .stat-label { font-size: 0.7rem; text-transform: uppercase; letter-spacing: 0.05em; color: var(--text-muted); }
    .stat-5xx .stat-value { color: var(--red); }
    .stat-4xx .stat-value { color: var(--amber); }

    .base-urls { display: flex; flex-wrap: wrap; gap: 8px; margin-bottom: 16px; }
    .url-badge { font-family: var(--mono); font-size: 0.75rem; padding: 4px 10px; border-radius: 999px; background: var(--bg-alt); border: 1px solid var(--border); }

    .toolbar { display: none; flex-wrap: wrap; align-items: center; gap: 12px; margin-bottom: 20px; padding: 12px; background: var(--bg-alt); border: 1px solid var(--border); border-radius: 10px; }
    body.js-enabled .toolbar { display: flex; }
    .filter-group { display: flex; gap: 4px; }
    .filter-btn, .btn {
      padding: 6px 12px;
      border-radius: 8px;
      border: 1px solid var(--border);
      background: var(--bg-card);
      color: var(--text);
      cursor: pointer;
      font-size: 0.8rem;
    }
    .filter-btn.active { background: var(--accent); border-color: var(--accent); color: #fff; }
    .btn:hover, .filter-btn:hover { border-color: var(--accent); }
    .search-input { flex: 1; min-width: 200px; padding: 7px 12px; border-radius: 8px; border: 1px solid var(--border); background: var(--bg); color: var(--text); }
    .duration-filter { display: flex; align-items: center; gap: 8px; font-size: 0.8rem; color: var(--text-muted); }
    .visible-count { font-size: 0.8rem; color: var(--text-muted); }

    .endpoint-group { margin-bottom: 24px; }
    .group-header { display: flex; align-items: center; gap: 10px; margin-bottom: 10px; }
    .group-endpoint { font-family: var(--mono); font-weight: 600; }
    .group-count { font-size: 0.75rem; padding: 2px 8px; border-radius: 999px; background: var(--accent); color: #fff; }
    .card-grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(320px, 1fr)); gap: 12px; }

    .failure-card {
      background: var(--bg-card);
      border: 1px solid var(--border);
      border-left: 4px solid var(--text-muted);
      border-radius: 10px;
      padding: 12px 14px;
      box-shadow: var(--shadow);
      cursor: pointer;
      overflow: hidden;
    }
    .failure-card:hover, .failure-card:focus { border-color: var(--accent); outline: none; }
    .failure-card.status-5xx { border-left-color: var(--red); }
    .failure-card.status-4xx { border-left-color: var(--amber); }
    .card-top { display: flex; align-items: center; gap: 8px; margin-bottom: 6px; font-size: 0.75rem; }
    .card-duration { margin-left: auto; color: var(--text-muted); font-family: var(--mono); }
    .card-kind, .status-tag { color: var(--text-muted); }
    .card-test { font-weight: 600; word-break: break-word; }
    .card-suite { font-size: 0.75rem; color: var(--text-muted); word-break: break-word; }
    .card-message { font-size: 0.8rem; margin: 8px 0; word-break: break-word; }
    .card-details summary { cursor: pointer; font-size: 0.75rem; color: var(--text-muted); }
    body.js-enabled .card-details { display: none; }

    .pill { display: inline-block; padding: 1px 8px; border-radius: 999px; font-weight: 700; font-family: var(--mono); color: #fff; background: var(--text-muted); }
    .pill-5xx { background: var(--red); }
    .pill-4xx { background: var(--amber); }
    .pill-2xx { background: var(--green); }

    pre { white-space: pre-wrap; word-break: break-word; background: var(--bg); border: 1px solid var(--border); border-radius: 8px; padding: 12px; font-size: 0.75rem; max-height: 420px; overflow: auto; }
    .curl-snippet { color: var(--green); }
    .empty-state { text-align: center; padding: 48px; color: var(--text-muted); }

    #modal-backdrop { display: none; position: fixed; inset: 0; background: rgba(0, 0, 0, 0.6); align-items: center; justify-content: center; padding: 24px; z-index: 10; }
    #modal-backdrop.open { display: flex; }
    #modal { width: min(960px, 100%); max-height: 90vh; overflow: auto; background: var(--bg-alt); border: 1px solid var(--border); border-radius: 12px; padding: 20px; }
    .modal-header { display: flex; justify-content: space-between; align-items: center; gap: 12px; margin-bottom: 12px; }
    #modal-title { font-family: var(--mono); font-weight: 700; word-break: break-word; }
    #modal-meta { display: flex; flex-wrap: wrap; gap: 10px; align-items: center; font-size: 0.8rem; color: var(--text-muted); }

    #toast { position: fixed; bottom: 24px; right: 24px; padding: 10px 16px; border-radius: 8px; background: var(--accent); color: #fff; opacity: 0; transition: opacity 0.2s ease; pointer-events: none; }
    #toast.visible { opacity: 1; }`;
}
