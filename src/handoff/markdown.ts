/**
 * Warden Handoff Markdown
 * Human-readable rendering of a stored handoff
 */

import type { StoredHandoff } from '../types/index.js';

export function generateHandoffMarkdown(handoff: StoredHandoff): string {
  const lines: string[] = [
    `# Session Handoff: ${handoff.from_session} -> ${handoff.to_session}`,
    `**Id:** ${handoff.id}`,
    `**Saved:** ${handoff.timestamp}`,
    '',
    '## Completed Tasks',
  ];

  if (handoff.completed_tasks.length > 0) {
    for (const task of handoff.completed_tasks) lines.push(`- [OK] ${task}`);
  } else {
    lines.push('_(no completed tasks)_');
  }
  lines.push('');

  lines.push('## Next Steps');
  if (handoff.next_steps.length > 0) {
    handoff.next_steps.forEach((step, i) => lines.push(`${i + 1}. ${step}`));
  } else {
    lines.push('_(no next steps defined)_');
  }
  lines.push('');

  lines.push('## Artifacts');
  if (handoff.artifacts.length > 0) {
    for (const artifact of handoff.artifacts) lines.push(`- \`${artifact}\``);
  } else {
    lines.push('_(no artifacts)_');
  }
  lines.push('');

  lines.push('## Notes');
  lines.push(handoff.notes.trim() ? handoff.notes.trim() : '_(none)_');
  lines.push('');

  if (Object.keys(handoff.context_snapshot).length > 0) {
    lines.push('## Context Snapshot');
    lines.push('```json');
    lines.push(JSON.stringify(handoff.context_snapshot, null, 2));
    lines.push('```');
    lines.push('');
  }

  return lines.join('\n');
}
