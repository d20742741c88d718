// Atlassian Document Format, as returned by Jira REST API v3 in rich text fields

const BLOCK_TYPES = new Set(['paragraph', 'heading', 'blockquote', 'codeBlock', 'panel', 'tableRow', 'rule']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function renderChildren(node: Record<string, unknown>): string {
  return Array.isArray(node.content) ? node.content.map(renderNode).join('') : '';
}

function renderNode(node: unknown): string {
  if (typeof node === 'string') {
    return node;
  }
  if (!isRecord(node)) {
    return '';
  }

  switch (node.type) {
    case 'text':
      return typeof node.text === 'string' ? node.text : '';
    case 'hardBreak':
      return '\n';
    case 'mention':
    case 'emoji':
      return isRecord(node.attrs) && typeof node.attrs.text === 'string' ? node.attrs.text : '';
    case 'listItem':
      return `- ${renderChildren(node).trim()}\n`;
    case 'tableCell':
    case 'tableHeader':
      return `${renderChildren(node).trim()} `;
    default:
      return typeof node.type === 'string' && BLOCK_TYPES.has(node.type)
        ? `${renderChildren(node)}\n`
        : renderChildren(node);
  }
}

/**
 * Flattens an ADF document to plain text: one line per block, list items
 * prefixed with "- ". Plain strings pass through unchanged.
 */
export function adfToText(document: unknown): string {
  return renderNode(document)
    .split('\n')
    .map(line => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
