/**
 * pdf-parse's library entry point. Importing the package root runs a
 * self-test when loaded from an ES module, so the code imports this file.
 */
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
