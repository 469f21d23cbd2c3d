export { QrDocument, type SettingsDocument, type JsonStringOptions } from './services/qrDocument';
export {
  buildPath,
  eyeOrigins,
  isEyeCell,
  pathBounds,
  pathContainsPoint,
  pathToSvgData,
  translatePath,
  type PathPrimitive,
  type PathShapes,
  type QrPath,
} from './services/pathBuilder';
export {
  asciiRepresentation,
  countOnCells,
  generateMatrix,
  matricesEqual,
  smallAsciiRepresentation,
} from './services/matrixEngine';
export { designFromSettings, designSettings, normalizeDesign, type DesignSettings } from './services/designSettings';
export { SvgContext } from './services/svgContext';
export { renderSvgToPdf, renderSvgToPng } from './services/qrExport';
export { LinkMessage, TextMessage, WifiMessage, type WifiCredentials, type WifiSecurity } from './services/messageFormatters';
export { QrCodeView, type QrCodeViewOptions, type QrCodeViewStyle } from './adapters/qrCodeView';
export { qrShapePath } from './adapters/qrShape';
export * from './types/qr';
export * from './types/design';
export * from './types/render';
export { AppError, EncodingError, ErrorCodes, RenderError, SettingsParseError } from './utils/errors';
export { formatColorHex, parseColorHex } from './utils/color';
export { DEFAULT_ERROR_CORRECTION, DEFAULT_PDF_RESOLUTION, DESIGN_SETTINGS_VERSION, FINDER_SIZE } from './constants/qr';
