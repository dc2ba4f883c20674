import chalk from "chalk";
import { Marked, type MarkedExtension } from "marked";
import { markedTerminal } from "marked-terminal";

/**
 * Lazily configured parser instance.
 *
 * markedTerminal() captures chalk's color level when it is called, so setup
 * waits for the first render (after the CLI has applied --no-color).
 */
let parser: Marked | undefined;

/**
 * Note: Type assertion needed due to @types/marked-terminal lag behind the runtime API.
 */
function getParser(): Marked {
  if (!parser) {
    parser = new Marked(
      markedTerminal({
        strong: chalk.bold,
        em: chalk.italic,
        del: chalk.dim.gray.strikethrough,
        code: chalk.yellow,
        codespan: chalk.yellow,
        heading: chalk.green.bold,
        firstHeading: chalk.magenta.underline.bold,
        link: chalk.blue,
        href: chalk.blue.underline,
        blockquote: chalk.gray.italic,
        tab: 2,
        listitem: chalk.reset,
        reflowText: false,
      }) as unknown as MarkedExtension,
    );
  }
  return parser;
}

/**
 * Drop the configured parser so the next render picks up a changed chalk level.
 */
export function resetMarkdownRenderer(): void {
  parser = undefined;
}

/**
 * Renders markdown text as styled terminal output.
 *
 * @example
 * ```typescript
 * renderMarkdown("**Important:** Check the `config.json` file");
 * // Returns styled text with bold "Important:" and code-styled "config.json"
 * ```
 */
export function renderMarkdown(text: string): string {
  const parsed = getParser().parse(text);
  if (typeof parsed !== "string") {
    return text;
  }

  // marked-terminal leaves inline markdown inside list items unprocessed
  const rendered = parsed
    .replace(/\*\*(.+?)\*\*/g, (_, content: string) => chalk.bold(content))
    // Italic: require non-space after * to avoid matching bullet points (  * )
    .replace(/(?<!\*)\*(\S[^*]*)\*(?!\*)/g, (_, content: string) => chalk.italic(content));

  return rendered.trimEnd();
}
