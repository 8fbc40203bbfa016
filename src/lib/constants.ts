// ROM and disc-image containers recognised as bare game entries
export const ROM_EXTENSIONS = [
  ".nes",
  ".sfc",
  ".smc",
  ".gb",
  ".gbc",
  ".gba",
  ".gen",
  ".md",
  ".sms",
  ".gg",
  ".pce",
  ".iso",
  ".cue",
  ".chd",
  ".zip",
  ".7z",
] as const;

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".webp", ".gif"] as const;
export const VIDEO_EXTENSIONS = [".mp4", ".webm", ".mov", ".mkv", ".avi"] as const;

// Filename stems preferred when picking media for a generated sidecar
export const PREFERRED_COVER_STEMS = ["cover", "box", "front"] as const;
export const PREFERRED_VIDEO_STEMS = ["video", "trailer", "preview"] as const;

export const SIDECAR_FILE_NAME = "game.json";
export const LIBRARY_JSON_FILE_NAME = "library.json";
export const INDEX_HTML_FILE_NAME = "index.html";
export const ASSETS_DIR_NAME = "assets";

export const DEFAULT_LIBRARY_DIR = "library";
export const DEFAULT_OUT_DIR = "dist";
export const DEFAULT_SITE_TITLE = "Retro Game Library";
export const DEFAULT_SITE_LANG = "en";

export const SLUG_FALLBACK = "item";
export const UNKNOWN_GAME_TITLE = "Unknown game";
