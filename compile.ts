import path from 'path';
import { promises as fs } from 'fs';
import { stringify } from 'csv-stringify';
import { save } from './algebra';
import { datingHistogram, schoolShares } from './charts';
import { defaultInput, defaultOutputDir } from './config';
import { describeFailure } from './result';
import { authorsOf, loadCatalogue, newCatalogue } from './utils';

const writeCsv = (filename: string, rows: (string | number)[][]) => {
  return new Promise<void>((resolve, reject) => {
    stringify(rows, {
      delimiter: ','
    }, (err, output) => {
      if (err) {
        reject(err);
      } else {
        fs.writeFile(filename, output, 'utf8').then(resolve, reject);
      }
    });
  });
}

const main = async () => {
  const [input = defaultInput, outputDir = defaultOutputDir] = process.argv.slice(2);

  const catalogue = newCatalogue();
  const loaded = await loadCatalogue(input, catalogue);
  if (!loaded.ok) {
    throw new Error(describeFailure(loaded.error));
  }
  console.info(`${input} successfully processed: ${catalogue.count} paintings`);

  await fs.mkdir(outputDir, { recursive: true });

  const schoolsCsv: (string | number)[][] = [['School', 'Paintings', 'Percentage', 'Color']];
  schoolShares(catalogue).forEach((slice) => {
    schoolsCsv.push([slice.label, slice.count, slice.percentage.toFixed(1), slice.color]);
  });
  await writeCsv(path.join(outputDir, 'schools.csv'), schoolsCsv);

  const histogram = datingHistogram(catalogue);
  const datingCsv: (string | number)[][] = [['Years', 'Paintings', 'Color']];
  histogram.bars.forEach((bar) => {
    datingCsv.push([bar.label, bar.count, bar.color]);
  });
  await writeCsv(path.join(outputDir, 'dating.csv'), datingCsv);
  console.info(`Dating grouped every ${histogram.interval} years`);

  const authors = authorsOf(catalogue);
  if (!authors.ok) {
    throw new Error(describeFailure(authors.error));
  }
  await save(authors.value, path.join(outputDir, 'authors.txt'));
  console.info(`${authors.value.count} distinct authors written to ${outputDir}`);
}

main().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
