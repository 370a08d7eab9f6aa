import type { ComponentProps, Section } from '../../src/types/index.js';

function SectionBlock({ section, images }: { section: Section; images: ComponentProps['data']['images'] }) {
  switch (section.kind) {
    case 'hero':
      return null;
    case 'value-prop':
    case 'about':
    case 'social-proof':
      return (
        <section className={`text-block ${section.kind}`} id={section.id}>
          <h2>{section.payload.title}</h2>
          <p>{section.payload.text}</p>
        </section>
      );
    case 'features':
      return (
        <section className="features" id={section.id}>
          <h2>{section.payload.title}</h2>
          <div className="grid">
            {section.payload.items.map((feature, index) => (
              <div className="card" key={feature.title}>
                {images.features[index] ? <img src={images.features[index]} alt={feature.title} /> : null}
                <span className="icon">{feature.icon}</span>
                <h3>{feature.title}</h3>
                <p>{feature.description}</p>
              </div>
            ))}
          </div>
        </section>
      );
    case 'benefits':
      return (
        <section className="benefits" id={section.id}>
          <h2>{section.payload.title}</h2>
          <ul>
            {section.payload.items.map(item => (
              <li key={item}>{item}</li>
            ))}
          </ul>
        </section>
      );
    case 'process':
      return (
        <section className="process" id={section.id}>
          <h2>{section.payload.title}</h2>
          <ol>
            {section.payload.steps.map((step, index) => (
              <li key={step.step}>
                {images.process[index] ? <img src={images.process[index]} alt={step.title} /> : null}
                <h3>{step.title}</h3>
                <p>{step.description}</p>
              </li>
            ))}
          </ol>
        </section>
      );
    case 'testimonials':
      return (
        <section className="testimonials" id={section.id}>
          <h2>{section.payload.title}</h2>
          {section.payload.items.map((item, index) => (
            <figure key={item.author}>
              {images.testimonials[index] ? <img src={images.testimonials[index]} alt={item.author} /> : null}
              <blockquote>{item.quote}</blockquote>
              <figcaption>{item.author}</figcaption>
            </figure>
          ))}
        </section>
      );
  }
}

/**
 * Component version of the one-pager. Font stacks are left generic on
 * purpose; the pipeline rewrites them to the brand fonts.
 */
export default function OnePager({ data }: ComponentProps) {
  const { brand, content, images, tokens } = data;
  const css = `
body { margin: 0; font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; background: ${tokens.colors.background}; color: ${tokens.colors.text}; }
h1, h2, h3 { font-family: system-ui, sans-serif; }
main { max-width: ${tokens.maxWidth}px; margin: 0 auto; padding: ${tokens.spacing.xl}px; }
.cta { background: ${tokens.colors.primary}; color: ${tokens.colors.onPrimary}; padding: ${tokens.spacing.sm}px ${tokens.spacing.lg}px; border-radius: ${tokens.radius.sm}px; }
.grid { display: grid; grid-template-columns: repeat(3, 1fr); gap: ${tokens.spacing.md}px; }`;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{`${brand.name} - ${content.hero.title}`}</title>
        <style dangerouslySetInnerHTML={{ __html: css }} />
      </head>
      <body>
        <main>
          <header className="hero">
            <span className="brand-name">{brand.name}</span>
            <h1 className="headline">{content.hero.title}</h1>
            <p className="subtitle">{content.hero.subtitle}</p>
            <p>{content.hero.description}</p>
            {images.hero[0] ? <img src={images.hero[0]} alt={content.hero.title} /> : null}
            <a className="cta" href="#contact">
              {content.callToAction}
            </a>
          </header>
          {content.sections.map(section => (
            <SectionBlock key={section.id} section={section} images={images} />
          ))}
        </main>
      </body>
    </html>
  );
}
