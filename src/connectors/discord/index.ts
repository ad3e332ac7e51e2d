export type { DiscordApiOptions, FetchHistoryOptions } from "./api.js";
export { DISCORD_API_BASE, DiscordApi, MAX_PAGE_SIZE } from "./api.js";
export type { BrowserApi, Selection } from "./browser.js";
export {
  ResourceBrowser,
  resolveChannel,
  resolveSelection,
  resolveServer,
  searchByName,
} from "./browser.js";
export type { ExportEngineConfig, ExportRequest } from "./engine.js";
export { ExportEngine } from "./engine.js";
export type { Choice, Prompter } from "./prompter.js";
export { PromptsPrompter } from "./prompter.js";
export type { ShellDeps, ShellState, ShellStateKind } from "./shell.js";
export { InteractiveShell, parseCount, TRANSITIONS } from "./shell.js";
export { channelLabel, channelSlug } from "./transform.js";
export type {
  ChannelKind,
  DiscordAttachment,
  DiscordChannel,
  DiscordMessage,
  DiscordServer,
  DiscordUser,
  ExportBatch,
  MessagePage,
  RenderedExport,
  ServerWithChannels,
} from "./types.js";
export {
  exportFilename,
  renderCsv,
  renderExport,
  renderJson,
  renderMarkdown,
  renderTxt,
  writeBatch,
} from "./writer.js";
