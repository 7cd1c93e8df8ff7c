const escapeHtml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');

export interface PreviewSize {
  width: number;
  height: number;
  style: string;
}

export const LOGO_PREVIEW: PreviewSize = { width: 50, height: 50, style: 'border-radius: 5px;' };
export const IMAGE_PREVIEW: PreviewSize = { width: 100, height: 75, style: 'object-fit: cover; border-radius: 4px;' };

export const renderPreview = (url: string | null, size: PreviewSize, placeholder: string): string => {
  if (!url) return placeholder;
  return `<img src="${escapeHtml(url)}" width="${size.width}" height="${size.height}" style="${size.style}" />`;
};

export const renderLogoPreview = (url: string | null) => renderPreview(url, LOGO_PREVIEW, 'No Logo');

export const renderImagePreview = (url: string | null) => renderPreview(url, IMAGE_PREVIEW, 'No Image');
