import { MatchIntent } from '../types/match';
import { escapeHtml } from '../utils/text';

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

export function formatScore(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

export function generateSubject(matchCount: number): string {
  return matchCount === 1 ? '1 new job match for your CV' : `${matchCount} new job matches for your CV`;
}

function jobCardHTML(intent: MatchIntent): string {
  const { job, score } = intent;

  return `
    <div style="border:1px solid #e0e0e0;border-radius:8px;padding:20px;margin-bottom:16px;background:#fff;">
      <div style="display:flex;justify-content:space-between;align-items:center;margin-bottom:8px;">
        <h2 style="margin:0;font-size:18px;color:#1a1a1a;">${escapeHtml(job.title)}</h2>
        <span style="background:#4CAF50;color:#fff;padding:4px 10px;border-radius:12px;font-size:14px;font-weight:bold;">${formatScore(score)}</span>
      </div>
      <p style="margin:4px 0;color:#555;font-size:14px;">${escapeHtml(job.company)} &bull; ${escapeHtml(job.location)}</p>
      <a href="${escapeHtml(job.url)}" style="display:inline-block;background:#2196F3;color:#fff;padding:10px 20px;border-radius:6px;text-decoration:none;font-size:14px;font-weight:bold;">View Job</a>
    </div>`;
}

export function generateEmailHTML(userName: string, intents: MatchIntent[]): string {
  const cards = intents.map(jobCardHTML).join('');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width,initial-scale=1">
</head>
<body style="margin:0;padding:0;background:#f5f5f5;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;">
  <div style="max-width:600px;margin:0 auto;padding:20px;">
    <h1 style="font-size:22px;color:#1a1a1a;margin-bottom:20px;">New job matches</h1>
    <p style="font-size:15px;color:#333;">Hi ${escapeHtml(userName)}, we found ${intents.length} new ${intents.length === 1 ? 'job' : 'jobs'} matching your CV.</p>
    ${cards}
    <p style="font-size:12px;color:#999;text-align:center;margin-top:24px;">
      You received this email because you uploaded your CV for job alerts.
    </p>
  </div>
</body>
</html>`;
}

export function generateEmailText(userName: string, intents: MatchIntent[]): string {
  const lines = [`Hi ${userName},`, '', `We found ${intents.length} new job matches for your CV:`, ''];
  for (const { job, score } of intents) {
    lines.push(`- ${job.title} at ${job.company} (${job.location}) - match ${formatScore(score)}`);
    lines.push(`  ${job.url}`);
  }
  return lines.join('\n');
}

export function renderMatchEmail(userName: string, intents: MatchIntent[]): RenderedEmail {
  return {
    subject: generateSubject(intents.length),
    html: generateEmailHTML(userName, intents),
    text: generateEmailText(userName, intents),
  };
}
