import type { Chapter, RunConfig } from "../types.js";

export type FilenameOptions = Pick<RunConfig, "audioFormat" | "numbers" | "prefix" | "prefixName">;

export interface FilenameContext {
  chapter: Chapter;
  videoTitle: string;
  totalChapters: number;
  options: FilenameOptions;
}

/** Returns one filename component, or undefined to leave it out. */
export type ComponentBuilder = (context: FilenameContext) => string | undefined;

export const COMPONENT_SEPARATOR = "_";
export const TITLE_PREFIX_MAX_LENGTH = 40;

const titleDelimiters = [" - ", "(", "["];

// Path separators, characters Windows rejects in names and every control character (C0, DEL, C1).
const unsafeCharacters = /[/\\:*?"<>|\p{Cc}]/gu;

export function sanitizeComponent(value: string): string {
  return value
    .replace(/\s+/g, " ")
    .replace(unsafeCharacters, "")
    .replace(/ {2,}/g, " ")
    .replace(/^[\s.]+|[\s.]+$/g, "");
}

export function numberWidth(totalChapters: number): number {
  return String(Math.max(1, totalChapters)).length;
}

export function formatTrackNumber(index: number, totalChapters: number): string {
  return String(index + 1).padStart(numberWidth(totalChapters), "0");
}

export function deriveTitlePrefix(videoTitle: string): string | undefined {
  let cut = videoTitle.length;
  for (const delimiter of titleDelimiters) {
    const position = videoTitle.indexOf(delimiter);
    if (position !== -1 && position < cut) {
      cut = position;
    }
  }

  const sanitized = sanitizeComponent(videoTitle.slice(0, cut).toLowerCase());
  const truncated = Array.from(sanitized).slice(0, TITLE_PREFIX_MAX_LENGTH).join("");
  const trimmed = truncated.replace(/[\s_.-]+$/, "");

  return trimmed || undefined;
}

const numberComponent: ComponentBuilder = ({ chapter, totalChapters, options }) =>
  options.numbers ? formatTrackNumber(chapter.index, totalChapters) : undefined;

const prefixComponent: ComponentBuilder = ({ options }) => {
  if (options.prefix === undefined) {
    return undefined;
  }
  return sanitizeComponent(options.prefix) || undefined;
};

const titlePrefixComponent: ComponentBuilder = ({ videoTitle, options }) =>
  options.prefixName ? deriveTitlePrefix(videoTitle) : undefined;

const chapterTitleComponent: ComponentBuilder = ({ chapter }) => {
  const title = sanitizeComponent(chapter.title ?? "");
  return title || `track${chapter.index + 1}`;
};

export const componentBuilders: readonly ComponentBuilder[] = [
  numberComponent,
  prefixComponent,
  titlePrefixComponent,
  chapterTitleComponent,
];

export function deriveFilename(
  chapter: Chapter,
  videoTitle: string,
  options: FilenameOptions,
  totalChapters: number,
): string {
  const context: FilenameContext = { chapter, videoTitle, totalChapters, options };
  const components = componentBuilders
    .map((build) => build(context))
    .filter((component): component is string => Boolean(component));

  return `${components.join(COMPONENT_SEPARATOR)}.${options.audioFormat}`;
}
