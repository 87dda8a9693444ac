export type {
  AudioLibraryOpts,
  ExportArtifact,
  UploadInput,
} from "./library.js";
export { AudioLibrary } from "./library.js";
