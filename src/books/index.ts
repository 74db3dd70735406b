export { BookService } from './book-service.js'
export type { BookSource, GetBookOptions } from './book-service.js'
export { RenumberService } from './renumber-service.js'
export type { PageWriteResult, PageWriter, RenumberApplyResult, RenumberPreview } from './renumber-service.js'
