import { compressPdf } from '../pipeline/compress';
import { expandInputs, isImageFile, isPdfName } from '../pipeline/discover';
import { imagesToPdf, buildRotationSpec } from '../pipeline/images-to-pdf';
import { mergePdfs } from '../pipeline/merge';
import { pdfToImages } from '../pipeline/render-pdf';
import type { ProgressSink } from '../pipeline/progress';
import { renameDateRangeFiles } from '../pipeline/rename';
import { USAGE, type Command } from './args';
import { TerminalProgressBar } from './progress-bar';

function printUsage(): void {
  console.log(USAGE);
}

/**
 * Run one parsed command. Resolves to the process exit code.
 */
export async function runCommand(
  command: Command,
  progress: ProgressSink = new TerminalProgressBar()
): Promise<number> {
  switch (command.command) {
    case 'help': {
      printUsage();
      return 0;
    }

    case 'merge': {
      const files = await expandInputs(command.files, isPdfName);
      const result = await mergePdfs(
        { files, outputPath: command.output, pageSize: command.pageSize },
        { progress }
      );
      console.log(result.message);
      return 0;
    }

    case 'compress': {
      const outcome = await compressPdf(
        { inputPath: command.input, outputPath: command.output, quality: command.quality },
        { progress }
      );
      if (!outcome.success) {
        console.error(`Error: ${outcome.message}`);
        return 1;
      }
      console.log(outcome.message);
      return 0;
    }

    case 'image-to-pdf': {
      const images = await expandInputs(command.images, isImageFile);
      const result = await imagesToPdf(
        { images, rotations: buildRotationSpec(command.rotations), outputPath: command.output },
        { progress }
      );
      console.log(result.message);
      return 0;
    }

    case 'pdf-to-image': {
      const pdfPaths = await expandInputs(command.pdfs, isPdfName);
      const result = await pdfToImages(
        { pdfPaths, outputFolder: command.output, dpi: command.dpi, format: command.format },
        { progress }
      );
      for (const { source, error } of result.errors) {
        console.error(`  ${source}: ${error}`);
      }
      console.log(result.message);
      return result.errors.length > 0 ? 1 : 0;
    }

    case 'rename': {
      const entries = await renameDateRangeFiles(command.directory, { dryRun: command.dryRun });
      for (const entry of entries) {
        const prefix = entry.applied ? 'Renamed' : '[dry run] Would rename';
        console.log(`${prefix}: ${entry.from} -> ${entry.to}`);
      }
      console.log(`${entries.length} file(s) ${command.dryRun ? 'to rename' : 'renamed'}`);
      return 0;
    }
  }
}
