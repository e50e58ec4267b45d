import { load as yamlLoad } from "js-yaml";

export type FrontmatterResult = {
  frontmatter: Record<string, unknown>;
  body: string;
};

type FrontmatterBounds = {
  start: number;
  end: number;
};

function findFrontmatterBounds(lines: string[]): FrontmatterBounds | null {
  if (lines.length === 0 || lines[0]?.trim() !== "---") {
    return null;
  }

  for (let index = 1; index < lines.length; index += 1) {
    if (lines[index]?.trim() === "---") {
      return { start: 0, end: index };
    }
  }

  return { start: 0, end: -1 };
}

function createFriendlyYamlError(error: unknown): string {
  let friendly = "Invalid YAML syntax in frontmatter. ";

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes("bad indentation")) {
      friendly += "Check that your indentation is consistent (use spaces).";
    } else if (message.includes("duplicate")) {
      friendly += "You have duplicate keys in your frontmatter.";
    } else {
      friendly += `Details: ${error.message}`;
    }
  } else {
    friendly += "Please check your frontmatter formatting.";
  }

  return friendly;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Splits a leading `---` YAML block from a template. Content without one is
 * returned untouched with empty frontmatter. Malformed frontmatter throws.
 */
export function parseFrontmatter(content: string): FrontmatterResult {
  const lines = content.split("\n");
  const bounds = findFrontmatterBounds(lines);
  if (!bounds) {
    return { frontmatter: {}, body: content };
  }

  if (bounds.end === -1) {
    throw new Error("Unclosed frontmatter block - missing closing ---");
  }

  const yaml = lines.slice(bounds.start + 1, bounds.end).join("\n");
  let parsed: unknown;
  try {
    parsed = yamlLoad(yaml);
  } catch (error) {
    throw new Error(createFriendlyYamlError(error), { cause: error });
  }

  if (parsed !== undefined && parsed !== null && !isPlainObject(parsed)) {
    throw new Error("Frontmatter must be a mapping of keys to values");
  }

  return {
    frontmatter: isPlainObject(parsed) ? parsed : {},
    body: lines.slice(bounds.end + 1).join("\n"),
  };
}
