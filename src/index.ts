export type { BatchOptions } from './batch.js'
export { startInjects } from './batch.js'
export type { DownloadOptions, DownloadResult, DownloadStatus, DownloadSummary } from './download.js'
export { downloadOneFile, downloadTask, fileNameFor } from './download.js'
export type { FailureCode, StructureErrorCode } from './errors.js'
export { failureCode, StructureError, SvgParseError } from './errors.js'
export type { ExtractOptions } from './extractor.js'
export { extract } from './extractor.js'
export { generateUniqueId, IdAllocator } from './ids.js'
export type { InjectOptions, InjectResult } from './injector.js'
export { addStats, createStats, inject, workOnSwitches } from './injector.js'
export { normalizeLang, normalizeLangList, splitLangList } from './lang.js'
export type { Logger } from './logger.js'
export { createLogger, silentLogger } from './logger.js'
export type { MergeOptions } from './mappings.js'
export { loadAllMappings, lookupTranslations, mergeMappings, mergeTranslations, toMappingFile } from './mappings.js'
export type { PrepareResult } from './prepare.js'
export { isSimpleCss, prepare } from './prepare.js'
export { getTargetPath, parseSvg, readSvg, readSvgText, serializeSvg, writeSvg, writeSvgText } from './svg-utils.js'
export { reorderTexts, sortSwitchTexts } from './switch-order.js'
export { normalizeText } from './text-utils.js'
export { getTitlesTranslations, makeTitleTranslations } from './titles.js'
export type * from './types.js'
export type { InjectFileResult, WorkflowOptions, WorkflowResult } from './workflows.js'
export { extractFile, injectFile, svgExtractAndInject, svgExtractAndInjects } from './workflows.js'
