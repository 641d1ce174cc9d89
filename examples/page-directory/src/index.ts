export { type AppConfig, loadAppConfig } from "./app/config"
export { type AppContext, type AppContextOptions, createAppContext } from "./app/create-context"
export { createRequestContext, type RequestContext } from "./app/create-request-context"
export { PageError, type PageErrorCode } from "./domains/pages/model/page.errors"
export type { Page, PageFilter, PageId } from "./domains/pages/model/page.model"
export { PageService, type PageServiceDeps } from "./domains/pages/services/page-service"
export { PageStore, type PageStoreDeps } from "./domains/pages/services/page-store"
