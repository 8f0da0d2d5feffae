export { createContactPipeline, defaultLimits } from "./plugin/createPipeline.js";
export type { ContactPipeline, PipelineLimits } from "./plugin/createPipeline.js";
export { makeApp } from "./app.js";
export { makeContactRoutes } from "./api/contact.js";
export { loadConfig } from "./config.js";
export type { AppConfig, HttpConfig, NotifyConfig } from "./config.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export type { SubmissionStore, InsertResult } from "./store/store.js";
export { ResendNotifier } from "./notify/resend.js";
export { SmtpNotifier } from "./notify/smtp.js";
export { OutboxNotifier } from "./notify/outbox.js";
export { selectNotifier } from "./notify/select.js";
export type { Notifier, Notification } from "./notify/notifier.js";
export { toHttpResponse } from "./core/response.js";
export type {
  ContactPayload,
  Submission,
  PipelineOutcome,
  RateScope,
  FieldViolation
} from "./types/contracts.js";
