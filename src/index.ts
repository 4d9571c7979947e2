export * from './types'
export { resumeSchema } from './schemas/resume.schema'
export {
  parseResume,
  safeParseResume,
  summarizeSections,
  ResumeValidationError,
  type ResumeParseResult,
  type ValidationIssue
} from './modules/resume/resume.validator'
export {
  isUrl,
  loadResume,
  loadResumeSource,
  ResumeLoadError,
  type LoadOptions,
  type ResumeLoadErrorKind
} from './modules/resume/resume.loader'
export {
  createGenerator,
  inferFormat,
  DocxResumeGenerator,
  PdfResumeGenerator,
  GenerationError,
  DEFAULT_PAGE_SIZE,
  type DocumentGenerator,
  type ResumeRenderer
} from './modules/generator/generator.service'
export { composeResume, blockText, SECTION_HEADINGS } from './modules/generator/composer/section-composer'
export { DEFAULT_THEME, THEME_NAMES, isThemeName, themeFor } from './modules/generator/themes/theme.registry'
export { formatDate, formatDateRange } from './modules/generator/services/date.util'
export { profileUrlFor, resolveProfileUrl } from './modules/generator/services/profile-url.util'
export { PdfMakeService } from './modules/generator/services/pdfmake.service'
export { DocxService } from './modules/generator/services/docx.service'
export { FontService, type FontLocator } from './modules/generator/services/font.service'
export { documentMetadataFor, type DocumentMetadata } from './modules/generator/services/metadata.util'
export { VERSION } from './version'
