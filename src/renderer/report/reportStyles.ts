export const REPORT_STYLES = `
body {
  font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
  margin: 24px;
  color: #1f2933;
  background: #f7f9fb;
}
h1 { margin-bottom: 4px; }
.meta { color: #52606d; margin: 2px 0; }
.stats { display: flex; gap: 16px; margin: 16px 0; padding: 0; list-style: none; }
.stats li { background: #fff; border: 1px solid #d9e2ec; border-radius: 6px; padding: 8px 14px; }
.stats strong { display: block; font-size: 1.4em; }
.verdict { font-weight: 600; padding: 8px 12px; border-radius: 6px; display: inline-block; }
.verdict.ok { background: #e3f9e5; color: #207227; }
.verdict.bad { background: #ffe3e3; color: #a61b1b; }
table { border-collapse: collapse; width: 100%; background: #fff; margin-top: 16px; }
th, td { border: 1px solid #d9e2ec; padding: 6px 8px; vertical-align: top; font-size: 0.9em; }
th { background: #f0f4f8; text-align: left; position: sticky; top: 0; }
tr.has-issues { background: #fff5f5; }
.status-ok { color: #207227; }
.status-missing { color: #a61b1b; font-weight: 600; }
.preview img { max-width: 180px; max-height: 140px; display: block; }
.preview .caption { font-size: 0.75em; color: #52606d; word-break: break-all; }
.placeholder { color: #9aa5b1; font-style: italic; font-size: 0.8em; }
.issues { margin: 0; padding-left: 16px; color: #a61b1b; }
code { font-size: 0.85em; }
`;
