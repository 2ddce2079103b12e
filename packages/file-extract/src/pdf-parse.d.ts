// The package entry runs a self-test when loaded from an ES module, so the
// library file is imported directly; it has the same signature as the entry.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse from "pdf-parse";
  export default pdfParse;
}
