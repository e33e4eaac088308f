/**
 * `@dirshelf/session`
 *
 * The interactive browser: a state machine over the cached catalog, the
 * screens drawn from it, and the controller that maps keys to actions. All
 * terminal access goes through the {@link Screen} and {@link KeyInput} seams.
 *
 * @packageDocumentation
 */

export {
    isChar,
    isSpecial,
    type InputWaitMode,
    type KeyInput,
    type KeyPress,
    type Screen,
    type ScreenSize,
    type SpecialKey,
    type Style,
} from './screen.js';
export { FLAT_VIEW, type ViewMode } from './view-mode.js';
export { computeViewportStart } from './viewport.js';
export { MarqueeState, type MarqueeOptions } from './marquee.js';
export { BrowseSession, type CatalogProvider } from './browse-session.js';
export {
    BROWSE_INSTRUCTIONS,
    bucketFooter,
    listRows,
    nameWidth,
    renderBrowse,
    renderConfirm,
    renderInfo,
    truncate,
    viewLine,
    type BrowseFrame,
    type ConfirmChoices,
    type SourceInfo,
} from './render.js';
export {
    formatDuration,
    indeterminateBar,
    progressBar,
    renderProgress,
    renderSummary,
    type ProgressView,
} from './download-view.js';
export { promptKey, promptLine, type PromptOptions } from './prompt.js';
export {
    SessionController,
    type Downloader,
    type FolderSettings,
    type SessionControllerOptions,
    type StrategyMode,
} from './controller.js';
