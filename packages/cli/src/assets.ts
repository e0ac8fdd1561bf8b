/** 1×1 PNG served at /favicon.ico so browsers stop asking. */
export const FAVICON_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR4nGNgYAAAAAMAASsJTYQAAAAASUVORK5CYII=',
  'base64'
);

/**
 * Rocket illustration for the landing page. Served as SVG at
 * /static/rocket.png, the URL the page links to.
 */
export const ROCKET_SVG = `<svg xmlns='http://www.w3.org/2000/svg' viewBox='0 0 512 512' width='220' height='220' aria-hidden='true'>
  <g>
    <path d='M186 256c0 0-42-86 68-198 110 112 68 198 68 198s-56 16-136 0z' fill='#ff4d6d'/>
    <path d='M256 96c0 0 64 24 104 72 40 48 40 112 40 112s-56 16-144 16-144-16-144-16 0-64 40-112C192 120 256 96 256 96z' fill='#ff6f91' opacity='0.95'/>
    <circle cx='326' cy='172' r='28' fill='#a6ecff'/>
    <path d='M156 400c-20-12-36-28-48-48l56-40 56 40-56 48z' fill='#ff8a65'/>
    <path d='M256 384c0 28-24 56-56 56s-56-28-56-56 24-56 56-56 56 28 56 56z' fill='#ffb74d' opacity='0.9'/>
  </g>
</svg>`;
