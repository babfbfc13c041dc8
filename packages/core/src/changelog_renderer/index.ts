export {
  CHANGELOG_HEADER,
  SECTION_DATE_SEPARATOR,
  formatEntry,
  formatSectionHeading,
  renderSection,
  renderSections,
  renderChangelog,
} from './changelog_renderer';
