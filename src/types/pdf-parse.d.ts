// pdf-parse's package entry runs a self-test when loaded outside a parent
// module; the library file itself carries the same API.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse = require('pdf-parse');
  export = pdfParse;
}
