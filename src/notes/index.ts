export {
  DEFAULT_MAX_ARCHIVE_ATTEMPTS,
  archiveCandidateName,
  archiveSource,
  assembleNote,
  deriveNoteFileName,
  placeNote,
  writeTextFileAtomic,
} from "./note-assembler.js";
export type { ArchiveSource, GeneratedNote, PlaceOptions, PlacementResult } from "./types.js";
