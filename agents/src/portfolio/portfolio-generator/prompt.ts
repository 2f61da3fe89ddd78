import {
  createPromptTemplate,
  executeTemplate,
  toChatMessages,
  type OllamaChatMessage,
} from '@folioforge/llm';
import { serializeStructuredCv, type StructuredCV } from '@folioforge/schemas';

/** How much of the source transcript rides along for verification. */
export const SOURCE_EXCERPT_CHARS = 2000;

const GENERATION_SYSTEM = `You are an elite frontend developer. You write complete, production-ready
single-file HTML portfolios. You reproduce the facts you are given exactly and
never add any of your own.`;

const GENERATION_TEMPLATE = createPromptTemplate(
  `Generate a COMPLETE index.html portfolio for the person below.

## PORTFOLIO DATA (JSON):
\`\`\`json
{cvJson}
\`\`\`

## ORIGINAL CV TEXT (FOR VERIFICATION - USE EXACT DATA):
\`\`\`
{sourceExcerpt}
\`\`\`

## TECHNICAL STACK
- Tailwind CSS: <script src="https://cdn.tailwindcss.com"></script>
- AOS: <link href="https://unpkg.com/aos@2.3.1/dist/aos.css" rel="stylesheet"> and
  <script src="https://unpkg.com/aos@2.3.1/dist/aos.js"></script> at the end of <body>
- Lucide icons: <i data-lucide="icon-name"></i> with
  <script src="https://unpkg.com/lucide@latest/dist/umd/lucide.js"></script>
- Google Fonts: Inter + Space Grotesk

## VISIBILITY
The page must never render black. Elements with data-aos stay visible without JavaScript,
and a load handler initialises Lucide, then AOS (duration 800, once, offset 50), then adds
the class aos-animate to every [data-aos] element after one second.

## DESIGN: DARK BENTO GRID
- Layout: a 12-column grid ("grid grid-cols-12 gap-4"); hero spans 12, about 8, skills 4,
  project cards 4 to 8 columns each.
- Theme: background #000000; cards "bg-white/5 backdrop-blur-md border border-white/10
  rounded-2xl p-6" with hover "hover:bg-white/10 hover:border-emerald-500/50"; text white
  and gray-400; accent emerald-400.
- Every card carries data-aos="fade-up".

## SECTIONS
1. Hero: name, the exact title, social icons for the links present
2. About: the summary, only if present
3. Skills: grouped tags
4. Projects: exact names, descriptions and tech stacks
5. Experience: timeline with exact roles, companies and periods
6. Contact: footer with the real email and links

## ABSOLUTE RULES
1. Use ONLY the data above. No placeholders, no invented projects, dates or links.
2. Empty fields and sections are omitted, not filled in.
3. If the title is "Junior Game Developer", write exactly that.
4. No <img> tags; Lucide icons only.
5. Start with <!DOCTYPE html> and end with </html>. Output only the HTML.`,
  { system: GENERATION_SYSTEM },
);

export function buildGenerationMessages(cv: StructuredCV, sourceText: string): OllamaChatMessage[] {
  return toChatMessages(
    executeTemplate(GENERATION_TEMPLATE, {
      cvJson: serializeStructuredCv(cv),
      sourceExcerpt: sourceText.slice(0, SOURCE_EXCERPT_CHARS),
    }),
  );
}
