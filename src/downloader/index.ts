export { Downloader, buildFormatArgs, classifyYtDlpError } from "./downloader.js";
export { tagTrack, buildTags, downloadCover, type TagOptions } from "./tagger.js";
export * from "./types.js";
