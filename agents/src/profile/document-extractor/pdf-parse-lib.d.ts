// pdf-parse publishes types (via @types/pdf-parse) for its entry point only.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
