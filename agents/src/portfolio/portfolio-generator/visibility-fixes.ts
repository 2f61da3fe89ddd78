/**
 * AOS hides every [data-aos] element until its script runs. When the model
 * forgets the fallback, the page loads black; these snippets undo that.
 */

export const AOS_FALLBACK_STYLE = `<style>
  /* AOS visibility fallback */
  [data-aos] { opacity: 1 !important; transform: none !important; }
  .aos-init [data-aos] { opacity: 0; transform: translateY(20px); }
  .aos-init .aos-animate { opacity: 1 !important; transform: none !important; }
</style>`;

export const AOS_FALLBACK_SCRIPT = `<script>
  window.addEventListener('load', function () {
    if (typeof lucide !== 'undefined') lucide.createIcons();
    if (typeof AOS !== 'undefined') AOS.init({ duration: 800, once: true, offset: 50 });
    setTimeout(function () {
      document.querySelectorAll('[data-aos]').forEach(function (el) {
        el.classList.add('aos-animate');
      });
    }, 1000);
  });
</script>`;

const HEAD_CLOSE = /<\/head\s*>/i;
const BODY_CLOSE = /<\/body\s*>/i;

export function hasVisibilityFix(html: string): boolean {
  return html.toLowerCase().includes('aos-animate');
}

/**
 * Insert the fallback style before `</head>` and the script before `</body>`.
 * A document missing either tag gets only the other snippet.
 */
export function applyVisibilityFixes(html: string): string {
  return html
    .replace(HEAD_CLOSE, (tag) => `${AOS_FALLBACK_STYLE}\n${tag}`)
    .replace(BODY_CLOSE, (tag) => `${AOS_FALLBACK_SCRIPT}\n${tag}`);
}
