/**
 * Utility exports for rendering mazes.
 */

export {
  type AsciiCharset,
  DEFAULT_CHARSET,
  type RenderOptions,
  renderAscii,
  SIMPLE_CHARSET,
} from "./ascii-renderer";
export {
  DEFAULT_PALETTE,
  type MazeColorPalette,
  type MazeHTMLOptions,
  renderMazeHTML,
} from "./html-renderer";
