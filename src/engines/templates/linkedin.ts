import { escapeHtml, safeUrl } from '../../utils/html.js';
import type { StaticTemplate, TemplateRenderContext } from '../TemplateRegistry.js';
import { htmlDocument } from './layout.js';

const SIZE = { width: 1200, height: 627 } as const;

const STYLES = `
body { overflow: hidden; }
.post { position: relative; display: grid; grid-template-columns: 1.2fr 1fr; height: ${SIZE.height}px; }
.copy { padding: 56px; display: flex; flex-direction: column; justify-content: center; background: var(--color-bg); }
.brand-name { color: var(--color-primary); font-weight: 700; letter-spacing: 0.04em; text-transform: uppercase; margin-bottom: var(--space-md); }
.copy h1 { font-size: 52px; }
.copy .subtitle { font-size: 22px; opacity: 0.8; margin-bottom: var(--space-lg); }
.visual { background: var(--color-primary); display: flex; align-items: center; justify-content: center; }
.visual img { width: 100%; height: 100%; }
.tags { display: flex; gap: var(--space-sm); flex-wrap: wrap; margin-bottom: var(--space-lg); }
.tag { background: var(--color-muted); border-radius: var(--radius-sm); padding: 4px 12px; font-size: 16px; }`;

function render({ brand, content, images, tokens }: TemplateRenderContext): string {
  const hero = images.hero[0] === undefined ? undefined : safeUrl(images.hero[0]);
  const featureSection = content.sections.find(section => section.kind === 'features');
  const tags =
    featureSection?.kind === 'features'
      ? featureSection.payload.items
          .slice(0, 3)
          .map(feature => `<span class="tag">${escapeHtml(`${feature.icon} ${feature.title}`)}</span>`)
          .join('')
      : '';

  const body = `<div class="post">
<div class="copy">
  <div class="brand-name">${escapeHtml(brand.name)}</div>
  <h1 class="headline">${escapeHtml(content.hero.title)}</h1>
  <p class="subtitle">${escapeHtml(content.hero.description)}</p>
  ${tags ? `<div class="tags">${tags}</div>` : ''}
  <div><span class="cta">${escapeHtml(content.callToAction)}</span></div>
</div>
<div class="visual">${hero ? `<img src="${escapeHtml(hero)}" alt="${escapeHtml(content.hero.title)}">` : ''}</div>
</div>`;

  return htmlDocument({
    title: `${brand.name} - ${content.hero.title}`,
    tokens,
    canvas: SIZE,
    styles: STYLES,
    body,
  });
}

/**
 * Single-image social post in the 1.91:1 link-share format.
 */
export const linkedinTemplate: StaticTemplate = {
  name: 'linkedin',
  description: 'Social post card with headline, top features and hero visual',
  defaultSize: SIZE,
  render,
};
