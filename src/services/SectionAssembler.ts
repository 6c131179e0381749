/**
 * SectionAssembler — attach body text to the headings of an outline.
 *
 * A heading owns every body fragment up to the next heading of the same or
 * a higher level, so an H2 absorbs the text of the H3s below it.
 */

import { TIER_RANK } from "./HeadingClassifier";
import { cleanText } from "./TextCleaner";
import type { Outline, Section } from "./outline.types";

export function assembleSections(
  documentId: string,
  outline: Outline,
  documentIndex = 0
): Section[] {
  const { entries, fragments, title } = outline;
  if (entries.length === 0) return [];

  const structural = new Set<number>(entries.map((e) => e.fragmentIndex));
  if (title) structural.add(title.fragmentIndex);

  const sections: Section[] = [];
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const rank = TIER_RANK[entry.level];

    let end = fragments.length;
    for (let j = i + 1; j < entries.length; j++) {
      if (TIER_RANK[entries[j].level] <= rank) {
        end = entries[j].fragmentIndex;
        break;
      }
    }

    const body: string[] = [];
    for (let k = entry.fragmentIndex + 1; k < end; k++) {
      if (structural.has(k)) continue;
      const text = cleanText(fragments[k].text);
      if (text) body.push(text);
    }

    sections.push({
      documentId,
      documentIndex,
      heading: { level: entry.level, text: entry.text, page: entry.page },
      fullContent: body.join(" "),
      page: entry.page,
    });
  }

  return sections;
}
