// The package entry point runs a self-test when loaded without a parent module,
// which is always the case under ESM; the library file carries the same API.
declare module "pdf-parse/lib/pdf-parse.js" {
  import pdfParse = require("pdf-parse");
  export = pdfParse;
}
