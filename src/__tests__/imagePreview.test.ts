import { renderImagePreview, renderLogoPreview } from '../utils/imagePreview';

describe('image previews', () => {
  it('renders a company logo thumbnail', () => {
    expect(renderLogoPreview('/media/company_logos/logo.png')).toBe(
      '<img src="/media/company_logos/logo.png" width="50" height="50" style="border-radius: 5px;" />'
    );
  });

  it('renders an object photo thumbnail', () => {
    expect(renderImagePreview('/media/object_images/front.jpg')).toBe(
      '<img src="/media/object_images/front.jpg" width="100" height="75" style="object-fit: cover; border-radius: 4px;" />'
    );
  });

  it('returns placeholders when there is no file', () => {
    expect(renderLogoPreview(null)).toBe('No Logo');
    expect(renderImagePreview(null)).toBe('No Image');
  });

  it('escapes the url', () => {
    expect(renderLogoPreview('/media/a"b<c>.png')).toBe(
      '<img src="/media/a&quot;b&lt;c&gt;.png" width="50" height="50" style="border-radius: 5px;" />'
    );
  });
});
