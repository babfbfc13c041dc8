export {
  createSectionData,
  addSectionEntry,
  sectionCategories,
  sectionEntryCount,
  isSectionEmpty,
} from './section_data';

export type {
  CommitEntry,
  SectionEntries,
  SectionData,
  ParsedSection,
  RenderableSection,
} from './section.types';
