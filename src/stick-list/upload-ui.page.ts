export const UPLOAD_UI_HTML = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>Stick List Transformer</title>
  <style>
    :root { font-family: "Segoe UI", Tahoma, sans-serif; color-scheme: light; }
    body { margin: 0; background: #f6f8fb; color: #1f2937; }
    .wrap { max-width: 1080px; margin: 32px auto; padding: 0 16px; }
    .card { background: #fff; border: 1px solid #dbe3ef; border-radius: 12px; padding: 16px; margin-bottom: 16px; }
    h1 { margin: 0 0 12px; font-size: 24px; }
    .row { display: flex; gap: 10px; align-items: center; flex-wrap: wrap; margin-bottom: 8px; }
    label { font-size: 14px; }
    button { background: #1165d8; color: #fff; border: 0; border-radius: 8px; padding: 10px 14px; cursor: pointer; }
    button[disabled] { opacity: .5; cursor: not-allowed; }
    a.download { display: inline-block; margin-right: 12px; color: #1165d8; font-weight: 600; }
    .muted { color: #5f6f82; font-size: 14px; }
    .status { font-weight: 600; }
    .ok { color: #0f766e; }
    .err { color: #b91c1c; }
    .grid { display: grid; grid-template-columns: repeat(4, minmax(0, 1fr)); gap: 12px; }
    .pill { border-radius: 10px; padding: 10px 12px; border: 1px solid #dbe3ef; }
    table { width: 100%; border-collapse: collapse; font-size: 14px; }
    th, td { text-align: left; border-bottom: 1px solid #e9eef6; padding: 8px 6px; }
    th { background: #f7f9fc; }
    @media (max-width: 840px) { .grid { grid-template-columns: 1fr; } }
  </style>
</head>
<body>
  <div class="wrap">
    <div class="card">
      <h1>Stick List Transformer</h1>
      <div class="row">
        <label>Supplier sheet (A) <input id="sourceInput" type="file" accept=".xlsx" /></label>
      </div>
      <div class="row">
        <label>Template override (optional) <input id="templateInput" type="file" accept=".xlsx" /></label>
      </div>
      <div class="row">
        <label><input id="defectExclusion" type="checkbox" checked /> Exclude quantities with non-ASCII annotations</label>
        <label><input id="filldown" type="checkbox" checked /> Fill down blank Model/Style/Blade cells in the template</label>
        <label><input id="diffReport" type="checkbox" /> Generate diff CSV against the template</label>
      </div>
      <div class="row">
        <button id="transformBtn">Transform</button>
        <span id="status" class="status muted">Select a supplier sheet to begin</span>
      </div>
      <p class="muted">The supplier sheet holds three stick blocks (Model, Blade, Flex, Left, Right) with data from row 5. Without a template override the server's default template is used.</p>
      <div id="downloads"></div>
    </div>

    <div class="card">
      <div class="grid">
        <div class="pill">Keys aggregated: <strong id="countKeys">0</strong></div>
        <div class="pill">Rows matched: <strong id="countMatched">0</strong></div>
        <div class="pill">Rows unmatched: <strong id="countUnmatched">0</strong></div>
        <div class="pill">Quantities excluded: <strong id="countExcluded">0</strong></div>
      </div>
    </div>

    <div class="card">
      <h3>Template Rows Without Stock</h3>
      <div id="unmatchedWrap" class="muted">No unmatched rows yet.</div>
    </div>

    <div class="card">
      <h3>Stock Without A Template Row</h3>
      <div id="unplacedWrap" class="muted">No unplaced stock yet.</div>
    </div>
  </div>

  <script src="/stick-list/upload-ui.js"></script>
</body>
</html>
`;
