export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/**
 * Unwraps an artifact that a generator returned inside a markdown code fence.
 * Text without a surrounding fence is returned trimmed of blank edges only.
 */
export const stripCodeFence = (str: string): string => {
  const match = /^\s*```[\w+-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```\s*$/.exec(str);
  if (match) {
    return `${match[1]}\n`;
  }
  return str.replace(/^\s*\n/, '');
};

/**
 * Lowercase, docker-reference-safe form of an arbitrary identifier.
 */
export const slugify = (str: string, maxLength = 64): string => {
  const slug = str
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^[-._]+|[-._]+$/g, '');
  return slug.slice(0, maxLength) || 'instance';
};
