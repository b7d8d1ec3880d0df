export { UploadClient, isRetryableStatus } from "./upload";
export type { HttpFetch, HttpRequest, HttpResponseLike, UploadClientOptions, UploadStats } from "./upload";
