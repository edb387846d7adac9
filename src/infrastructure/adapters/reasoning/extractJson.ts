const fence = /^```/;

/**
 * Pulls the first `{...}` object out of a model answer, tolerating markdown
 * fences and surrounding prose. Returns null when nothing parses.
 */
export const extractJson = (payload: string | null | undefined): unknown => {
  if (!payload) {
    return null;
  }

  let content = payload.trim();

  if (fence.test(content)) {
    content = content
      .split('\n')
      .filter((line) => !fence.test(line.trim()))
      .join('\n')
      .trim();
  }

  const first = content.indexOf('{');
  const last = content.lastIndexOf('}');
  if (first !== -1 && last > first) {
    content = content.slice(first, last + 1);
  }

  try {
    return JSON.parse(content);
  } catch {
    return null;
  }
};
