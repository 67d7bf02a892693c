/**
 * Public API for ssdb-shared.
 */

// Domain types
export type {
  Disulfide,
  DisulfideRecord,
  ResidueRef,
  DatabaseFile,
  DatabaseStats,
  Theme,
} from './types/disulfide';

// Errors
export { SsdbError, isSsdbError, toMessage } from './errors';
export type { SsdbErrorKind } from './errors';

// Database
export { JsonDisulfideDatabase, parseResidues } from './database/DisulfideDatabase';
export type { DisulfideDatabase } from './database/DisulfideDatabase';
export { loadDatabase, createDatabase, parseDatabaseFile } from './database/loader';

// State
export { SelectionStateStore } from './state/SelectionStateStore';
export type { UIState, ItemListChange, SelectionStoreOptions } from './state/SelectionStateStore';
export { resolveTheme, createThemeCache } from './state/themeResolver';
export type { SessionContext } from './state/themeResolver';

// Formatters
export {
  title,
  info,
  summary,
  databaseBanner,
  databaseInfo,
  groupThousands,
} from './formatters/infoPresenter';

// Rendering
export {
  RenderStyle,
  RENDER_STYLES,
  styleCode,
  styleLabel,
  isRenderStyle,
  parseRenderStyle,
} from './render/styles';
export type { StyleCode } from './render/styles';
export { RenderSlot, createSurfaceFactory } from './render/RenderSlot';
export { RenderInvocation, buildRenderRequest } from './render/RenderInvocation';
export type { RenderOutcome, RenderInvocationDeps, ItemSource } from './render/RenderInvocation';
export { TextRenderer, lineText, atomColors } from './render/TextRenderer';
export type { AtomElement } from './render/TextRenderer';
export { TextRegion, createTextRegions } from './render/textRegions';
export type { TextRegionSet } from './render/textRegions';
export { DEFAULT_LAYOUT } from './render/types';
export type {
  RenderRequest,
  RenderHandle,
  Renderer,
  RenderSurface,
  Segment,
  StyledLine,
  Sizing,
  SurfaceFactory,
  SurfaceLayout,
  TextRegions,
  TextRegionSink,
} from './render/types';

// Controller
export { EventBus } from './controller/EventBus';
export type { BusEvent, DispatchResult, Handler, HandlerContext } from './controller/EventBus';
export { CascadeController } from './controller/CascadeController';
export type { ControlsState, CascadeControllerDeps } from './controller/CascadeController';
export {
  entrySelected,
  itemSelected,
  styleChanged,
  viewModeChanged,
  refreshRequested,
} from './controller/events';
export type { BrowserEvent, BrowserEventType } from './controller/events';
export { createBrowserSession } from './controller/session';
export type { BrowserSession, BrowserSessionOptions } from './controller/session';

// Config
export { getConfigDir, getConfigPath } from './paths';
export { readFileConfig, parseFileConfig, resolveConfig } from './config';
export type { FileConfig, ConfigOverrides, BrowserConfig } from './config';
