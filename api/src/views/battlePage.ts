import type { BattleOutcome, BattleReport, LeaderboardEntry, SideResult } from '../types';
import { escapeHtml, formatScore } from './htmlUtils';

export interface BattleForm {
  devA: string;
  devB: string;
  codeA: string;
  codeB: string;
}

export interface BattlePageView {
  form: BattleForm;
  warning?: string;
  report?: BattleReport;
}

export const DEFAULT_FORM: BattleForm = {
  devA: 'Developer A',
  devB: 'Developer B',
  codeA: '',
  codeB: '',
};

const STYLE = `
  body { font-family: system-ui, sans-serif; max-width: 960px; margin: 2rem auto; padding: 0 1rem; color: #1f2933; }
  .columns { display: grid; grid-template-columns: 1fr 1fr; gap: 1rem; }
  label { display: block; font-weight: 600; margin-bottom: 0.25rem; }
  input, textarea { width: 100%; box-sizing: border-box; font: inherit; }
  textarea { height: 300px; font-family: ui-monospace, monospace; }
  button { margin-top: 1rem; padding: 0.5rem 1.25rem; font-size: 1rem; }
  .banner { padding: 0.75rem 1rem; border-radius: 6px; margin: 0.75rem 0; }
  .banner.success { background: #e3f9e5; }
  .banner.info { background: #e6f0ff; }
  .banner.warning { background: #fff4d6; }
  .banner.error { background: #fde8e8; }
`;

export function banner(kind: 'success' | 'info' | 'warning' | 'error', text: string): string {
  return `<div class="banner ${kind}" role="status">${escapeHtml(text)}</div>`;
}

export function describeSide(side: SideResult): string {
  if (!side.submitted) return `${side.name} did not submit any code.`;
  return `${side.name}'s score: ${formatScore(side.score)}`;
}

export function describeOutcome(outcome: BattleOutcome): { kind: 'success' | 'info'; text: string } {
  if (outcome.kind === 'tie') return { kind: 'info', text: "It's a tie!" };
  if (outcome.reason === 'walkover') {
    return { kind: 'success', text: `${outcome.winner} wins by default: only submission received.` };
  }
  return { kind: 'success', text: `🥇 ${outcome.winner} wins!` };
}

export function renderLeaderboard(entries: LeaderboardEntry[]): string {
  if (entries.length === 0) return banner('info', 'No rankings yet.');

  const rows = entries
    .map((e) => `<li>${e.rank}. <strong>${escapeHtml(e.name)}</strong> - <strong>${formatScore(e.score)}</strong></li>`)
    .join('\n');
  return `<hr>
<h2>Current rankings 🏆</h2>
<ol class="leaderboard" style="list-style: none; padding: 0">
${rows}
</ol>`;
}

function renderReviews(sides: SideResult[]): string {
  const reviews = sides
    .filter((s) => s.review)
    .map((s) => `<h4>${escapeHtml(s.name)}'s code review</h4>\n<p>${escapeHtml(s.review ?? '')}</p>`)
    .join('\n');
  return `<h3>Professional code review (paid)</h3>\n${reviews}`;
}

function renderReport(report: BattleReport): string {
  const parts: string[] = ['<hr>', '<h2>Battle results</h2>'];

  for (const side of report.sides) {
    if (side.error) parts.push(banner('error', `Linter failed for ${side.name}: ${side.error.message}`));
    parts.push(`<h3>${escapeHtml(describeSide(side))}</h3>`);
  }

  const outcome = describeOutcome(report.outcome);
  parts.push(banner(outcome.kind, outcome.text));
  parts.push(renderReviews(report.sides));
  parts.push(renderLeaderboard(report.leaderboard));
  return parts.join('\n');
}

function renderForm(form: BattleForm): string {
  return `<form method="post" action="/battle">
<div class="columns">
  <div>
    <label for="devA">Developer A's name</label>
    <input id="devA" name="devA" value="${escapeHtml(form.devA)}">
  </div>
  <div>
    <label for="devB">Developer B's name</label>
    <input id="devB" name="devB" value="${escapeHtml(form.devB)}">
  </div>
</div>
<div class="columns">
  <div>
    <h2>${escapeHtml(form.devA)}'s code</h2>
    <textarea id="codeA" name="codeA" aria-label="Code input A">${escapeHtml(form.codeA)}</textarea>
  </div>
  <div>
    <h2>${escapeHtml(form.devB)}'s code</h2>
    <textarea id="codeB" name="codeB" aria-label="Code input B">${escapeHtml(form.codeB)}</textarea>
  </div>
</div>
<button type="submit">Start the battle! 🥇</button>
</form>`;
}

export function renderBattlePage(view: BattlePageView): string {
  const body = [
    '<h1>Lint Arena 🥊</h1>',
    '<p>Enter Python code for two developers. The higher <strong>pylint</strong> score wins, and every score lands on the leaderboard.</p>',
    renderForm(view.form),
    view.warning ? banner('warning', view.warning) : '',
    view.report ? renderReport(view.report) : '',
  ].filter((part) => part !== '');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Lint Arena</title>
<style>${STYLE}</style>
</head>
<body>
${body.join('\n')}
</body>
</html>
`;
}

export function renderErrorPage(message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="UTF-8"><title>Lint Arena</title></head>
<body>
<h1>Lint Arena 🥊</h1>
${banner('error', message)}
<p><a href="/">Back to the arena</a></p>
</body>
</html>
`;
}
