/**
 * HTML views for the report server
 */

import { CATEGORY_LABELS, REPORT_CATEGORIES, isReportCategory } from '../validation/index.js';
import type { Report } from '../store/index.js';
import type { FlashMessage } from './flash.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * `2025-03-01T09:15:00.000Z` → `2025-03-01 09:15:00`
 */
export function formatTimestamp(timestamp: string): string {
  return timestamp.replace('T', ' ').slice(0, 19);
}

export function categoryLabel(category: string): string {
  return isReportCategory(category) ? CATEGORY_LABELS[category] : category;
}

const STYLE = `
    * { box-sizing: border-box; margin: 0; padding: 0; }
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: #f4f5f7;
      color: #1f2933;
      min-height: 100vh;
    }
    .container { max-width: 900px; margin: 0 auto; padding: 40px 20px; }
    header { margin-bottom: 30px; }
    header nav a { margin-right: 15px; color: #4f46e5; text-decoration: none; }
    h1 { font-size: 30px; margin-bottom: 10px; }
    .section { background: #fff; border-radius: 12px; padding: 25px; margin-bottom: 20px; box-shadow: 0 1px 3px rgba(0,0,0,0.08); }
    .section h2 { font-size: 20px; margin-bottom: 20px; }
    label { display: block; font-weight: 500; margin: 15px 0 5px; }
    input, select, textarea { width: 100%; padding: 10px; border: 1px solid #cbd2d9; border-radius: 6px; font: inherit; }
    button { margin-top: 20px; padding: 12px 25px; background: #6366f1; color: #fff; border: 0; border-radius: 8px; font-weight: 500; cursor: pointer; }
    .flash { padding: 12px 16px; border-radius: 8px; margin-bottom: 15px; }
    .flash-success { background: #def7ec; color: #03543f; }
    .flash-warning { background: #fdf6b2; color: #723b13; }
    .flash-danger { background: #fde8e8; color: #9b1c1c; }
    table { width: 100%; border-collapse: collapse; }
    th, td { text-align: left; padding: 10px; border-bottom: 1px solid #e4e7eb; vertical-align: top; }
    td.url { word-break: break-all; }
    .empty { text-align: center; padding: 30px; opacity: 0.6; }
`;

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <div class="container">
    <header>
      <h1>Video Reports</h1>
      <nav><a href="/">Submit a report</a><a href="/history">History</a></nav>
    </header>
${body}
  </div>
</body>
</html>`;
}

function renderFlashes(flashes: FlashMessage[]): string {
  return flashes
    .map((f) => `    <div class="flash flash-${f.category}">${escapeHtml(f.message)}</div>`)
    .join('\n');
}

function renderReportRow(report: Report): string {
  const screenshot = report.screenshot_path
    ? `<a href="/${escapeHtml(report.screenshot_path)}" target="_blank">View</a>`
    : '—';

  return `          <tr>
            <td>${report.id}</td>
            <td class="url"><a href="${escapeHtml(report.video_url)}" target="_blank" rel="noopener noreferrer">${escapeHtml(report.video_url)}</a></td>
            <td>${escapeHtml(categoryLabel(report.report_category))}</td>
            <td>${escapeHtml(report.report_details ?? '')}</td>
            <td>${formatTimestamp(report.timestamp)}</td>
            <td>${screenshot}</td>
          </tr>`;
}

function renderReportTable(reports: Report[], emptyText: string): string {
  if (reports.length === 0) {
    return `      <div class="empty">${escapeHtml(emptyText)}</div>`;
  }

  return `      <table>
        <thead>
          <tr><th>#</th><th>Video</th><th>Reason</th><th>Details</th><th>Submitted</th><th>Screenshot</th></tr>
        </thead>
        <tbody>
${reports.map(renderReportRow).join('\n')}
        </tbody>
      </table>`;
}

export function renderIndexPage(reports: Report[], flashes: FlashMessage[]): string {
  const options = REPORT_CATEGORIES.map(
    (category) => `          <option value="${category}">${escapeHtml(CATEGORY_LABELS[category])}</option>`
  ).join('\n');

  return layout(
    'Report a video',
    `${renderFlashes(flashes)}
    <div class="section">
      <h2>Report a video</h2>
      <form method="post" action="/submit_report">
        <label for="video_url">Video URL</label>
        <input id="video_url" name="video_url" type="url" placeholder="https://www.youtube.com/watch?v=..." required>
        <label for="report_category">Reason</label>
        <select id="report_category" name="report_category" required>
          <option value="">Select a reason</option>
${options}
        </select>
        <label for="report_details">Details (optional)</label>
        <textarea id="report_details" name="report_details" rows="4"></textarea>
        <button type="submit">Submit report</button>
      </form>
    </div>
    <div class="section">
      <h2>Recent reports</h2>
${renderReportTable(reports, 'No reports yet.')}
    </div>`
  );
}

export function renderHistoryPage(reports: Report[]): string {
  return layout(
    'Report history',
    `    <div class="section">
      <h2>All reports (${reports.length})</h2>
${renderReportTable(reports, 'No reports have been submitted.')}
    </div>`
  );
}

export function renderNotFoundPage(): string {
  return layout(
    'Not found',
    `    <div class="section">
      <div class="empty">Page not found.</div>
    </div>`
  );
}
