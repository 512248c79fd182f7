/**
 * ABI exports
 *
 *   ┌──────────────────────┐
 *   │  MangaChapterToken   │  ◄── ERC-1155, one id per chapter
 *   └──────────┬───────────┘
 *              │ ChapterPublished / ChapterMinted / Transfer*
 *              ▼
 *   ┌──────────────────────┐
 *   │  Activity ledger     │  ◄── off-chain monthly statistics
 *   └──────────────────────┘
 *
 * @module abis
 */

export { MangaChapterTokenAbi } from "./MangaChapterToken";
