import { toDownloadLink } from "../output/report.js";
import { PANELS } from "../panels.js";
import type { PanelId, PanelResult } from "../panels.js";
import { MAX_FREE_TEXT, SPECIES } from "../types.js";
import type { PetProfile } from "../types.js";
import type { ProfileFormValues } from "./form.js";

export interface PageState {
  form: ProfileFormValues;
  /** Uploaded previous report, as submitted */
  previousJson: string;
  previous?: PetProfile;
  previousError?: string;
  activePanel: PanelId;
  result?: PanelResult;
  formErrors: string[];
  records: PetProfile[];
  recordsError?: string;
  modelName: string;
}

/**
 * Escape HTML special characters.
 */
export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

const STYLES = `
  :root {
    --bg: #0d1117; --surface: #161b22; --border: #30363d;
    --text: #e6edf3; --text-muted: #8b949e; --accent: #58a6ff;
    --green: #3fb950; --orange: #d29922; --red: #f85149;
  }
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Helvetica, Arial, sans-serif; background: var(--bg); color: var(--text); line-height: 1.6; }
  .layout { display: grid; grid-template-columns: 300px 1fr; min-height: 100vh; }
  aside { background: var(--surface); border-right: 1px solid var(--border); padding: 1.5rem; }
  aside h2 { font-size: 1.1rem; margin: 1rem 0 0.75rem; }
  aside h2:first-child { margin-top: 0; }
  label { display: block; font-size: 0.85rem; color: var(--text-muted); margin-bottom: 0.75rem; }
  input, select, textarea { display: block; width: 100%; margin-top: 0.25rem; padding: 0.4rem 0.5rem; background: var(--bg); color: var(--text); border: 1px solid var(--border); border-radius: 4px; font: inherit; }
  textarea { min-height: 4rem; resize: vertical; }
  main { padding: 2rem 1.5rem; max-width: 1000px; }
  h1 { font-size: 2rem; margin-bottom: 0.25rem; }
  .subtitle { color: var(--text-muted); margin-bottom: 1.5rem; font-size: 0.95rem; }
  .upload { background: var(--surface); border: 1px solid var(--border); border-radius: 8px; padding: 1rem; margin-bottom: 1.5rem; }

  /* Tabs */
  .tabs { display: flex; gap: 0; border-bottom: 1px solid var(--border); overflow-x: auto; }
  .tab { padding: 0.6rem 1.2rem; cursor: pointer; color: var(--text-muted); border-bottom: 2px solid transparent; font-size: 0.9rem; white-space: nowrap; background: none; border-top: none; border-left: none; border-right: none; }
  .tab:hover { color: var(--text); }
  .tab.active { color: var(--accent); border-bottom-color: var(--accent); }
  .tab-content { display: none; background: var(--surface); border: 1px solid var(--border); border-top: none; border-radius: 0 0 8px 8px; padding: 1.5rem; }
  .tab-content.active { display: block; }

  .action { padding: 0.5rem 1rem; background: #1f6feb; color: #fff; border: none; border-radius: 6px; cursor: pointer; font-size: 0.9rem; }
  .action:disabled { background: var(--border); color: var(--text-muted); cursor: default; }
  .section { margin-top: 1.5rem; }
  .section h3 { font-size: 1.1rem; margin-bottom: 0.5rem; color: var(--accent); }
  .markdown { white-space: pre-wrap; font-size: 0.9rem; }
  .alert { margin-top: 1rem; padding: 0.6rem 0.9rem; border-radius: 6px; font-size: 0.9rem; }
  .alert-error { background: #f8514922; color: var(--red); border: 1px solid #f8514955; }
  .alert-success { background: #3fb95022; color: var(--green); border: 1px solid #3fb95055; }
  .download { display: inline-block; margin-top: 1rem; color: var(--accent); }
  hr { border: none; border-top: 1px solid var(--border); margin: 1.5rem 0; }

  table { width: 100%; border-collapse: collapse; font-size: 0.85rem; margin: 1rem 0; }
  th { text-align: left; padding: 0.5rem 0.75rem; border-bottom: 2px solid var(--border); color: var(--text-muted); font-weight: 600; }
  td { padding: 0.5rem 0.75rem; border-bottom: 1px solid var(--border); vertical-align: top; }
  tr:last-child td { border-bottom: none; }
  td a { color: var(--accent); }

  @media (max-width: 768px) {
    .layout { grid-template-columns: 1fr; }
  }
`;

// Copies an uploaded file into the form, and marks the clicked button busy
const SCRIPT = `
function switchTab(btn, id) {
  document.querySelectorAll('.tab').forEach(t => t.classList.remove('active'));
  document.querySelectorAll('.tab-content').forEach(c => c.classList.remove('active'));
  btn.classList.add('active');
  document.getElementById('panel-' + id).classList.add('active');
}
document.getElementById('previous-file').addEventListener('change', (event) => {
  const file = event.target.files[0];
  if (!file) return;
  const reader = new FileReader();
  reader.onload = () => {
    document.getElementById('previous-report').value = reader.result;
    document.getElementById('previous-status').textContent = 'Loaded ' + file.name + '.';
    document.getElementById('analysis-button').disabled = false;
  };
  reader.readAsText(file);
});
document.getElementById('profile-form').addEventListener('submit', (event) => {
  document.querySelectorAll('.action').forEach(b => { b.disabled = true; });
  if (event.submitter) event.submitter.textContent = 'Working…';
});
`;

function field(label: string, control: string): string {
  return `<label>${esc(label)}${control}</label>`;
}

function textInput(name: keyof ProfileFormValues, value: string): string {
  return `<input type="text" name="${name}" value="${esc(value)}" maxlength="${MAX_FREE_TEXT}">`;
}

function textArea(name: keyof ProfileFormValues, value: string): string {
  return `<textarea name="${name}" maxlength="${MAX_FREE_TEXT}">${esc(value)}</textarea>`;
}

function numberInput(
  name: keyof ProfileFormValues,
  value: string,
  max: number,
): string {
  return `<input type="number" name="${name}" value="${esc(value)}" min="0" max="${max}" step="0.1" required>`;
}

function renderSidebar(form: ProfileFormValues): string {
  const options = SPECIES.map(
    (s) =>
      `<option value="${s}"${form.species === s ? " selected" : ""}>${s}</option>`,
  ).join("");

  return `<aside>
    <h2>Pet Information</h2>
    ${field("Pet's Name", textInput("name", form.name))}
    ${field("Pet Type", `<select name="species">${options}</select>`)}
    ${field("Breed", textInput("breed", form.breed))}
    ${field("Age (years)", numberInput("age", form.age, 30))}
    ${field("Weight (kg)", numberInput("weight", form.weight, 100))}
    ${field("Health Conditions (if any)", textArea("healthConditions", form.healthConditions))}
    <h2>Food Preferences &amp; Allergies</h2>
    ${field("Favorite Foods", textArea("favoriteFoods", form.favoriteFoods))}
    ${field("Known Allergies", textArea("allergies", form.allergies))}
  </aside>`;
}

function renderUpload(state: PageState): string {
  let status = "";
  if (state.previous) {
    status = `Previous report loaded successfully! (${esc(state.previous.name || "unnamed pet")}${state.previous.timestamp ? `, ${esc(state.previous.timestamp)}` : ""})`;
  } else if (state.previousError) {
    status = esc(state.previousError);
  }
  return `<div class="upload">
    ${field("Upload Previous Report (JSON)", `<input type="file" id="previous-file" accept=".json,application/json">`)}
    <input type="hidden" id="previous-report" name="previousReport" value="${esc(state.previousJson)}">
    <p id="previous-status" class="subtitle">${status}</p>
  </div>`;
}

function renderAlerts(result: PanelResult | undefined, formErrors: string[]): string {
  const errors = [...formErrors, ...(result?.errors ?? [])];
  const parts = errors.map(
    (e) => `<div class="alert alert-error">${esc(e)}</div>`,
  );
  if (result?.notice) {
    parts.push(`<div class="alert alert-success">${esc(result.notice)}</div>`);
  }
  return parts.join("\n");
}

function renderResult(result: PanelResult): string {
  const parts = result.sections.map(
    (s) => `<div class="section">
      <h3>${esc(s.heading)}</h3>
      <div class="markdown">${esc(s.text)}</div>
    </div>`,
  );
  if (result.contacts) {
    parts.push(`<hr><div class="section">
      <h3>Emergency Contacts</h3>
      <ul>${result.contacts.map((c) => `<li>${esc(c)}</li>`).join("")}</ul>
    </div>`);
  }
  if (result.report) {
    parts.push(toDownloadLink(result.report));
  }
  return parts.join("\n");
}

function exportFileName(record: PetProfile): string {
  const stamp = record.timestamp.replace(/[^0-9A-Za-z]+/g, "-");
  return `pet_record_${stamp || "undated"}.json`;
}

/** The record log as a table, one export link per row. */
export function renderRecordsTable(records: PetProfile[]): string {
  if (records.length === 0) {
    return `<p class="subtitle">No health records saved yet.</p>`;
  }

  const rows = records
    .map((r) => {
      const href = `data:application/json;charset=utf-8,${encodeURIComponent(JSON.stringify(r, null, 2))}`;
      return `<tr><td>${esc(r.timestamp)}</td><td>${esc(r.name)}</td><td>${esc(r.species)}</td><td>${esc(r.breed)}</td><td>${r.age}</td><td>${r.weight}</td><td>${esc(r.healthConditions)}</td><td>${esc(r.favoriteFoods)}</td><td>${esc(r.allergies)}</td><td><a href="${esc(href)}" download="${esc(exportFileName(r))}">Export</a></td></tr>`;
    })
    .join("");

  return `<table>
    <thead><tr><th>Timestamp</th><th>Name</th><th>Type</th><th>Breed</th><th>Age (years)</th><th>Weight (kg)</th><th>Health Conditions</th><th>Favorite Foods</th><th>Allergies</th><th></th></tr></thead>
    <tbody>${rows}</tbody>
  </table>`;
}

function renderPanel(id: PanelId, action: string, state: PageState): string {
  const active = state.activePanel === id;
  const result = active ? state.result : undefined;
  const disabled = id === "analysis" && !state.previous ? " disabled" : "";
  const buttonId = id === "analysis" ? ` id="analysis-button"` : "";

  let body = `<button class="action" type="submit" form="profile-form" formaction="/panels/${id}"${buttonId}${disabled}>${esc(action)}</button>
    ${renderAlerts(result, active ? state.formErrors : [])}
    ${result ? renderResult(result) : ""}`;

  if (id === "records") {
    body += state.recordsError
      ? `<div class="alert alert-error">${esc(state.recordsError)}</div>`
      : renderRecordsTable(state.records);
  }

  return `<div id="panel-${id}" class="tab-content${active ? " active" : ""}">
    ${body}
  </div>`;
}

/**
 * Render the whole application page for the given state.
 */
export function renderPage(state: PageState): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Advanced Pet Care Assistant</title>
<style>${STYLES}</style>
</head>
<body>
<form id="profile-form" method="post" action="/">
<div class="layout">
  ${renderSidebar(state.form)}
  <main>
    <h1>🐾 Advanced Pet Care Assistant</h1>
    <p class="subtitle">Recommendations by ${esc(state.modelName)}</p>
    ${renderUpload(state)}
    <div class="tabs">
      ${PANELS.map((p) => `<button type="button" class="tab${p.id === state.activePanel ? " active" : ""}" onclick="switchTab(this, '${p.id}')">${esc(p.label)}</button>`).join("\n      ")}
    </div>
    ${PANELS.map((p) => renderPanel(p.id, p.action, state)).join("\n    ")}
  </main>
</div>
</form>
<script>${SCRIPT}</script>
</body>
</html>`;
}
