import type { ComponentProps } from '../../../../src/types/index.js';

const CSS = 'body { font-family: Arial, Helvetica, sans-serif; } h1 { font-family: "Segoe UI", sans-serif; }';

export default function Card({ data, campaignParameters }: ComponentProps) {
  return (
    <html>
      <head>
        <style dangerouslySetInnerHTML={{ __html: CSS }} />
      </head>
      <body>
        <h1>{data.content.hero.title}</h1>
        <p className="audience">{campaignParameters.who ?? data.content.hero.audience}</p>
        <span className="brand">{data.brand.name}</span>
        <span className="images">{data.images.hero.length}</span>
      </body>
    </html>
  );
}
