import chalk from 'chalk';
import {
  confidenceLabel,
  type ArticleSummary,
  type ConfidenceLevel,
  type EditorialStandards,
  type SignedPayload,
  type Statistic,
  type WireItem,
} from '@newsdesk/core';

const CONFIDENCE_COLORS: Record<ConfidenceLevel, (text: string) => string> = {
  'verified': chalk.green,
  'reported': chalk.cyan,
  'forecast': chalk.magenta,
  'estimated': chalk.yellow,
  'self-reported': chalk.yellow,
};

function formatConfidence(level: ConfidenceLevel): string {
  return CONFIDENCE_COLORS[level](confidenceLabel(level));
}

function formatDate(timestamp: string): string {
  return timestamp.slice(0, 10);
}

export function formatArticle(article: ArticleSummary): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`# ${article.headline}`));
  lines.push(`Section: ${article.section} | Date: ${formatDate(article.publishedAt)}`);
  if (article.author) {
    lines.push(`By: ${article.author}`);
  }
  lines.push(`Confidence: ${formatConfidence(article.confidence)}`);
  lines.push('');
  lines.push(article.summary);
  if (article.sources.length > 0) {
    lines.push('');
    lines.push('Sources:');
    for (const source of article.sources) {
      lines.push(`  - ${source.label} ${chalk.dim(source.url)}`);
    }
  }
  return lines.join('\n');
}

export function formatArticleList(title: string, articles: readonly ArticleSummary[]): string {
  if (articles.length === 0) {
    return `${chalk.bold(title)}\nNo articles found.`;
  }
  const blocks = articles.map((article, i) => `---\n## [${i + 1}] ${formatArticle(article)}`);
  return `${chalk.bold(title)} - ${articles.length} found\n\n${blocks.join('\n\n')}`;
}

/** Statistics grouped by category, in the order categories first appear. */
export function formatStatistics(stats: readonly Statistic[]): string {
  const groups = new Map<string, Statistic[]>();
  for (const stat of stats) {
    const category = stat.category ?? 'General';
    const group = groups.get(category) ?? [];
    group.push(stat);
    groups.set(category, group);
  }

  const sections: string[] = [chalk.bold('# Agent Economy Data Terminal')];
  for (const [category, items] of groups) {
    const lines = [chalk.bold(`## ${category}`)];
    for (const stat of items) {
      const unit = stat.unit ? ` ${stat.unit}` : '';
      lines.push(
        `  ${stat.label}: ${stat.value}${unit} [${formatConfidence(stat.confidence)}] `
        + chalk.dim(`(Source: ${stat.source.label}, updated ${formatDate(stat.updatedAt)})`),
      );
    }
    sections.push(lines.join('\n'));
  }
  return sections.join('\n\n');
}

export function formatWireFeed(items: readonly WireItem[]): string {
  const lines = [chalk.bold('# Wire Feed'), ''];
  if (items.length === 0) {
    lines.push('No new items.');
  }
  for (const item of items) {
    lines.push(`${chalk.bold(item.timestamp)} - ${item.text}`);
    const sources = item.sources.map(s => s.label).join(', ') || 'Unattributed';
    lines.push(chalk.dim(`  Source: ${sources} | Category: ${item.category ?? 'General'}`));
  }
  return lines.join('\n');
}

export function formatStandards(standards: EditorialStandards): string {
  const lines = [chalk.bold('# Editorial Standards'), '', chalk.bold('## Verification Rules')];
  standards.verificationRules.forEach((rule, i) => lines.push(`${i + 1}. ${rule}`));

  lines.push('', chalk.bold('## Confidence Levels'));
  for (const { level, definition } of standards.confidenceLevels) {
    lines.push(`- ${formatConfidence(level)}: ${definition}`);
  }

  lines.push('', chalk.bold('## Data Verification Tiers'));
  for (const tier of standards.verificationTiers) {
    lines.push(`- Tier ${tier.tier} (${tier.name}): ${tier.description}`);
  }

  lines.push('', chalk.bold('## Corrections Policy'), standards.correctionsPolicy);
  lines.push('', chalk.bold('## Independence'), standards.independence);
  lines.push('', chalk.bold('## Signed Responses'), standards.integrity.canonicalization, standards.integrity.verification);
  return lines.join('\n');
}

export function formatSignature(envelope: SignedPayload): string {
  if (envelope.verification === 'signed' && envelope.keyId) {
    return chalk.dim(`Signed (ed25519, key ${envelope.keyId})`);
  }
  return chalk.yellow('Unsigned: no signing key available');
}
