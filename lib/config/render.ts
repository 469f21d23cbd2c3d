// Renderer configuration
// These values are used for generated PDFs and to bound raster output

export const RENDER_CONFIG = {
  // PDF document info
  pdf: {
    creator: process.env.QR_PDF_CREATOR || 'qrcraft',
    author: process.env.QR_PDF_AUTHOR || '',
    title: process.env.QR_PDF_TITLE || 'QR Code',
  },

  // Largest raster edge in device pixels; bigger requests fail instead of allocating
  maxRasterDimension: Number(process.env.QR_MAX_RASTER_DIMENSION) || 16384,

  // Step-by-step console output for render and export calls
  verboseLogging: process.env.QR_DEBUG === '1' || process.env.QR_DEBUG === 'true',
};
