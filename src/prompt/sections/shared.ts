export function joinPromptBlocks(blocks: string[]): string {
  return blocks.filter((b) => b.trim().length > 0).join("\n\n").trim();
}

export function collapseCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\s+/g, " ").trim();
}
