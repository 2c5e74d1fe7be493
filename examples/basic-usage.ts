import { OutlineExtractor, formatStructure, parseLayoutDocument, type LayoutJson } from '../src';

/**
 * Basic usage example for docoutline
 */
function main() {
  // 1. A layout as another parser might serialize it (top-left boxes)
  const layout: LayoutJson = {
    fileName: 'field-study.pdf',
    pages: [
      {
        number: 1,
        width: 612,
        height: 792,
        lines: [
          { spans: [{ text: 'Coastal Field Study', bbox: [72, 60, 380, 84], size: 24, bold: true, font: 'Helvetica-Bold' }] },
          { spans: [{ text: '1. Introduction', bbox: [72, 140, 230, 158], size: 18, bold: true, font: 'Helvetica-Bold' }] },
          { spans: [{ text: '1.1 Study Area', bbox: [72, 300, 200, 314], size: 14, bold: true, font: 'Helvetica-Bold' }] },
        ],
      },
    ],
  };

  // 2. Validate and convert
  const document = parseLayoutDocument(layout);

  // 3. Extract with the default rule catalog
  const extractor = new OutlineExtractor();
  const report = extractor.analyze(document);

  console.log('--- Outline ---');
  console.log(formatStructure(report.structure));

  console.log('\n--- Details ---');
  console.log('Profile:', report.profile);
  console.log('Title source:', report.titleSource);
  for (const candidate of report.candidates) {
    console.log(`  p${candidate.page} ${candidate.score.toFixed(1)}  ${candidate.text}`);
  }
  for (const warning of report.warnings) {
    console.log(`  [${warning.code}] ${warning.message}`);
  }
}

main();
