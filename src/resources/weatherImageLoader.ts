import { access } from "node:fs/promises";
import { join } from "node:path";
import type { ResourceLoader } from "../core/displayArbiter";
import { DESCRIPTION_LEVEL_PATTERN, HEADLINE_LEVEL_PATTERN } from "../core/messageFormatter";
import type { QuakeEvent } from "../types/quake";
import { errorMessage, type Logger } from "../utils/log";

const COLOUR_ONLY = /(红色|橙色|黄色|蓝色|白色)预警/;
const GRADED_PATTERN = /([^，。：:；;]+?)(?:Ⅳ级|Ⅴ级|Ⅲ级|Ⅱ级|Ⅰ级)?预警/;
const TYPE_PREFIX = /^(高速公路|发布|预计|根据|上述地区)/;
const MAX_TYPE_LENGTH = 10;

/**
 * Signal image file names worth probing for a weather alert, most specific first.
 * The headline gives `发布{type}{colour}预警`; the description may name a different type,
 * in which case the colour is borrowed from the headline.
 */
export function weatherImageCandidates(headline: string, description: string): string[] {
  const candidates: string[] = [];
  let colour: string | undefined;

  const fromHeadline = HEADLINE_LEVEL_PATTERN.exec(headline);
  if (fromHeadline?.[1] && fromHeadline[2]) {
    colour = fromHeadline[2];
    candidates.push(`${fromHeadline[1]}${colour}预警.jpg`);
  }
  colour ??= COLOUR_ONLY.exec(headline)?.[1];

  if (description) {
    const coloured = DESCRIPTION_LEVEL_PATTERN.exec(description);
    const match = coloured ?? GRADED_PATTERN.exec(description);
    if (match?.[1]) {
      const type = match[1].trim().replace(TYPE_PREFIX, "").trim();
      if (coloured?.[2]) colour = coloured[2];
      colour ??= COLOUR_ONLY.exec(description)?.[1];
      if (type && type.length <= MAX_TYPE_LENGTH && colour) candidates.push(`${type}${colour}预警.jpg`);
    }
  }

  return [...new Set(candidates)];
}

export class WeatherImageLoader implements ResourceLoader {
  constructor(
    private readonly directory: string,
    private readonly log: Logger
  ) {}

  async resolveWeatherImage(event: QuakeEvent): Promise<string | undefined> {
    const headline = event.extra.headline ?? event.extra.title ?? "";
    if (!headline) return undefined;

    for (const file of weatherImageCandidates(headline, event.extra.description ?? "")) {
      const path = join(this.directory, file);
      try {
        await access(path);
        this.log.debug(`Weather signal image ${file} found`);
        return path;
      } catch (error) {
        this.log.debug(`Weather signal image ${file} unavailable: ${errorMessage(error)}`);
      }
    }
    return undefined;
  }
}
