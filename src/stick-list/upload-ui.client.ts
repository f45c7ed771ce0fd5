export const UPLOAD_UI_CLIENT_JS = `const sourceInput = document.getElementById('sourceInput');
const templateInput = document.getElementById('templateInput');
const transformBtn = document.getElementById('transformBtn');
const statusEl = document.getElementById('status');
const downloadsEl = document.getElementById('downloads');
const countKeys = document.getElementById('countKeys');
const countMatched = document.getElementById('countMatched');
const countUnmatched = document.getElementById('countUnmatched');
const countExcluded = document.getElementById('countExcluded');
const unmatchedWrap = document.getElementById('unmatchedWrap');
const unplacedWrap = document.getElementById('unplacedWrap');

const escapeHtml = (value) => String(value ?? '').replace(/[&<>"']/g, (ch) => '&#' + ch.charCodeAt(0) + ';');

const tableHtml = (rows) => {
  if (!rows || rows.length === 0) return '<span class="muted">None</span>';
  const body = rows.map((r) => '<tr>' +
    '<td>' + escapeHtml(r.rowNumber) + '</td>' +
    '<td>' + escapeHtml(r.model) + '</td>' +
    '<td>' + escapeHtml(r.style) + '</td>' +
    '<td>' + escapeHtml(r.blade) + '</td>' +
    '<td>' + escapeHtml(r.flex) + '</td>' +
  '</tr>').join('');
  return '<table><thead><tr><th>Row</th><th>Model</th><th>Style</th><th>Blade</th><th>Flex</th></tr></thead><tbody>' + body + '</tbody></table>';
};

const downloadLink = (fileName, blob) => {
  const link = document.createElement('a');
  link.className = 'download';
  link.href = URL.createObjectURL(blob);
  link.download = fileName;
  link.textContent = 'Download ' + fileName;
  return link;
};

const base64ToBlob = (base64, type) => {
  const bytes = Uint8Array.from(atob(base64), (ch) => ch.charCodeAt(0));
  return new Blob([bytes], { type });
};

transformBtn.addEventListener('click', async () => {
  const source = sourceInput.files && sourceInput.files[0];
  if (!source) {
    statusEl.textContent = 'Please choose a supplier sheet first.';
    statusEl.className = 'status err';
    return;
  }

  const formData = new FormData();
  formData.append('source', source);
  const template = templateInput.files && templateInput.files[0];
  if (template) formData.append('template', template);
  ['defectExclusion', 'filldown', 'diffReport'].forEach((name) => {
    formData.append(name, document.getElementById(name).checked ? 'true' : 'false');
  });

  transformBtn.disabled = true;
  downloadsEl.innerHTML = '';
  statusEl.textContent = 'Transforming...';
  statusEl.className = 'status muted';

  try {
    const res = await fetch('/stick-list/transform', { method: 'POST', body: formData });
    const data = await res.json().catch(() => ({}));

    if (!res.ok) {
      const message = Array.isArray(data.message) ? data.message.join('; ') : data.message;
      statusEl.textContent = message || 'Transform failed.';
      statusEl.className = 'status err';
      return;
    }

    downloadsEl.appendChild(downloadLink(
      data.fileName,
      base64ToBlob(data.workbookBase64, 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'),
    ));
    if (data.diffReport) {
      downloadsEl.appendChild(downloadLink(data.diffReport.fileName, new Blob([data.diffReport.csv], { type: 'text/csv' })));
    }

    const summary = data.summary || {};
    const unmatched = Array.isArray(summary.unmatched) ? summary.unmatched : [];
    const unplaced = Array.isArray(summary.unplaced) ? summary.unplaced : [];

    countKeys.textContent = String(summary.keysAggregated ?? 0);
    countMatched.textContent = String(summary.rowsMatched ?? 0);
    countUnmatched.textContent = String(unmatched.length);
    countExcluded.textContent = String(summary.quantitiesExcluded ?? 0);
    unmatchedWrap.innerHTML = tableHtml(unmatched);
    unplacedWrap.innerHTML = tableHtml(unplaced);

    statusEl.textContent = 'Done. Check unmatched rows and unplaced stock below.';
    statusEl.className = unplaced.length > 0 ? 'status err' : 'status ok';
  } catch (error) {
    statusEl.textContent = 'Network/server error during transform.';
    statusEl.className = 'status err';
  } finally {
    transformBtn.disabled = false;
  }
});
`;
