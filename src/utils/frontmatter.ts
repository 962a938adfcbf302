/**
 * YAML frontmatter handling for Markdown files being imported
 */

import matter from 'gray-matter';

/**
 * Split a Markdown file into its front matter data and trimmed body
 */
export function parseFrontmatter(content: string): {
  frontmatter: Record<string, unknown>;
  body: string;
} {
  const { data, content: body } = matter(content);
  return {
    frontmatter: data,
    body: body.trim(),
  };
}
