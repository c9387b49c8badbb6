import { CLI_DEFAULTS, COMPRESSION_DEFAULTS, PAGE_SIZES, RENDER_DEFAULTS } from '../config/constants';
import { ValidationError } from '../errors';
import { dpiSchema, imageFormatSchema, pageSizeSchema, qualitySchema } from '../schemas';
import type { CompressionQuality, ImageFormat, PageSize } from '../types';

export type Command =
  | { command: 'help' }
  | { command: 'merge'; files: string[]; output: string; pageSize: PageSize }
  | { command: 'compress'; input: string; output?: string; quality: CompressionQuality }
  | { command: 'image-to-pdf'; images: string[]; output: string; rotations: Array<[number, number]> }
  | { command: 'pdf-to-image'; pdfs: string[]; output?: string; dpi: number; format: ImageFormat }
  | { command: 'rename'; directory: string; dryRun: boolean };

export const USAGE = `
pdftools - merge, compress and convert PDF files

Usage:
  pdftools <command> [arguments] [options]

Commands:
  merge <files...>          Merge PDFs (directories expand to the PDFs inside)
    -o, --output <file>       Output file (default: ${CLI_DEFAULTS.MERGE_OUTPUT})
    --page-size <size>        a4, a3, letter, legal or WxH in points (default: a4)

  compress <input>          Compress a PDF with Ghostscript
    -o, --output <file>       Output file (default: <input>_compressed.pdf)
    --quality <preset>        printer, ebook, screen or prepress (default: ${COMPRESSION_DEFAULTS.QUALITY})

  image-to-pdf <images...>  Combine png, jpg, tiff, webp or gif images (not bmp) into one PDF
    -o, --output <file>       Output file (default: ${CLI_DEFAULTS.IMAGE_PDF_OUTPUT})
    --rotate <idx,angle...>   Rotate image idx counterclockwise by angle degrees
                              (takes every following argument up to the next option)

  pdf-to-image <pdfs...>    Render every page of each PDF to images
    -o, --output <folder>     Parent folder for <name>_images (default: beside each PDF)
    --dpi <number>            Resolution, ${RENDER_DEFAULTS.MIN_DPI}-${RENDER_DEFAULTS.MAX_DPI} (default: ${RENDER_DEFAULTS.DPI})
    --format <format>         png, jpg, jpeg, tiff or webp (default: ${RENDER_DEFAULTS.FORMAT});
                              bmp is not supported

  rename <directory>        Rename YYYY-MM-DD__YYYY-MM-DD PDFs to "YYYY-MM-DD ~ YYYY-MM-DD.pdf"
    --dry-run                 Only print what would change

Options:
  -h, --help                Show this help message

Environment:
  LOG_LEVEL, LOG_FORMAT, GHOSTSCRIPT_PATH, PDFTOPPM_PATH, PDFINFO_PATH

Examples:
  pdftools merge a.pdf b.pdf -o out.pdf
  pdftools compress big.pdf --quality screen
  pdftools image-to-pdf scan1.jpg scan2.png --rotate 0,90 1,-90
  pdftools pdf-to-image book.pdf --dpi 300 --format jpg
`;

const ROTATION_ARG = /^(\d+),(-?\d+(?:\.\d+)?)$/;

interface RawArgs {
  positional: string[];
  values: Map<string, string>;
  flags: Set<string>;
  rotations: Array<[number, number]>;
}

interface OptionSpec {
  values?: Record<string, string>;
  flags?: string[];
  rotate?: boolean;
}

const COMMAND_OPTIONS: Record<Exclude<Command['command'], 'help'>, OptionSpec> = {
  merge: { values: { '-o': 'output', '--output': 'output', '--page-size': 'page-size' } },
  compress: { values: { '-o': 'output', '--output': 'output', '--quality': 'quality' } },
  'image-to-pdf': { values: { '-o': 'output', '--output': 'output' }, rotate: true },
  'pdf-to-image': {
    values: { '-o': 'output', '--output': 'output', '--dpi': 'dpi', '--format': 'format' },
  },
  rename: { flags: ['--dry-run'] },
};

function isCommandName(name: string): name is keyof typeof COMMAND_OPTIONS {
  return Object.prototype.hasOwnProperty.call(COMMAND_OPTIONS, name);
}

function isOption(arg: string): boolean {
  return arg.startsWith('-') && arg !== '-';
}

function collect(args: string[], spec: OptionSpec): RawArgs {
  const raw: RawArgs = { positional: [], values: new Map(), flags: new Set(), rotations: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const valueName =
      spec.values && Object.prototype.hasOwnProperty.call(spec.values, arg) ? spec.values[arg] : undefined;

    if (valueName) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new ValidationError(`Option ${arg} requires a value`, valueName);
      }
      raw.values.set(valueName, value);
      i++;
    } else if (spec.flags?.includes(arg)) {
      raw.flags.add(arg.replace(/^--/, ''));
    } else if (spec.rotate && arg === '--rotate') {
      // takes every following argument up to the next option
      const first = raw.rotations.length;
      while (i + 1 < args.length && !isOption(args[i + 1])) {
        raw.rotations.push(parseRotation(args[++i]));
      }
      if (raw.rotations.length === first) {
        throw new ValidationError('Option --rotate requires at least one idx,angle pair', 'rotate');
      }
    } else if (!isOption(arg)) {
      raw.positional.push(arg);
    } else {
      throw new ValidationError(`Unknown option ${arg}`);
    }
  }

  return raw;
}

export function parseRotation(value: string): [number, number] {
  const match = value.match(ROTATION_ARG);
  if (!match) {
    throw new ValidationError(`Invalid rotation "${value}", expected idx,angle`, 'rotate');
  }
  return [parseInt(match[1], 10), parseFloat(match[2])];
}

function isPageSizeName(name: string): name is keyof typeof PAGE_SIZES {
  return Object.prototype.hasOwnProperty.call(PAGE_SIZES, name);
}

export function parsePageSize(value: string): PageSize {
  const named = value.toLowerCase();
  if (isPageSizeName(named)) {
    return PAGE_SIZES[named];
  }

  const match = value.match(/^(\d+(?:\.\d+)?)x(\d+(?:\.\d+)?)$/i);
  const parsed = pageSizeSchema.safeParse(
    match ? { width: parseFloat(match[1]), height: parseFloat(match[2]) } : null
  );
  if (!parsed.success) {
    throw new ValidationError(`Invalid page size "${value}", expected a4, a3, letter, legal or WxH`, 'page-size');
  }
  return parsed.data;
}

// the engines take any positive DPI; the command line keeps to a practical range
const cliDpiSchema = dpiSchema.min(RENDER_DEFAULTS.MIN_DPI).max(RENDER_DEFAULTS.MAX_DPI);

function parseDpi(value: string | undefined): number {
  if (value === undefined) return RENDER_DEFAULTS.DPI;
  const parsed = cliDpiSchema.safeParse(Number(value));
  if (!parsed.success) {
    throw new ValidationError(
      `DPI must be an integer between ${RENDER_DEFAULTS.MIN_DPI} and ${RENDER_DEFAULTS.MAX_DPI}`,
      'dpi'
    );
  }
  return parsed.data;
}

function parseFormat(value: string | undefined): ImageFormat {
  if (value === undefined) return RENDER_DEFAULTS.FORMAT;
  const parsed = imageFormatSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(`Unsupported image format "${value}"`, 'format');
  }
  return parsed.data;
}

function parseQuality(value: string | undefined): CompressionQuality {
  if (value === undefined) return COMPRESSION_DEFAULTS.QUALITY;
  const parsed = qualitySchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(`Unknown quality "${value}", expected printer, ebook, screen or prepress`, 'quality');
  }
  return parsed.data;
}

function requirePositional(raw: RawArgs, min: number, what: string): void {
  if (raw.positional.length < min) {
    throw new ValidationError(`Missing required argument: ${what}`);
  }
}

export function parseArgs(argv: string[]): Command {
  if (argv.length === 0 || argv.some((arg) => arg === '--help' || arg === '-h')) {
    return { command: 'help' };
  }

  const [name, ...rest] = argv;
  if (!isCommandName(name)) {
    throw new ValidationError(`Unknown command ${name}`);
  }
  const raw = collect(rest, COMMAND_OPTIONS[name]);

  switch (name) {
    case 'merge': {
      requirePositional(raw, 1, 'files');
      const pageSize = raw.values.get('page-size');
      return {
        command: 'merge',
        files: raw.positional,
        output: raw.values.get('output') ?? CLI_DEFAULTS.MERGE_OUTPUT,
        pageSize: pageSize ? parsePageSize(pageSize) : PAGE_SIZES.a4,
      };
    }
    case 'compress': {
      requirePositional(raw, 1, 'input');
      if (raw.positional.length > 1) {
        throw new ValidationError('compress takes a single input file');
      }
      return {
        command: 'compress',
        input: raw.positional[0],
        output: raw.values.get('output'),
        quality: parseQuality(raw.values.get('quality')),
      };
    }
    case 'image-to-pdf': {
      requirePositional(raw, 1, 'images');
      return {
        command: 'image-to-pdf',
        images: raw.positional,
        output: raw.values.get('output') ?? CLI_DEFAULTS.IMAGE_PDF_OUTPUT,
        rotations: raw.rotations,
      };
    }
    case 'pdf-to-image': {
      requirePositional(raw, 1, 'pdfs');
      return {
        command: 'pdf-to-image',
        pdfs: raw.positional,
        output: raw.values.get('output'),
        dpi: parseDpi(raw.values.get('dpi')),
        format: parseFormat(raw.values.get('format')),
      };
    }
    case 'rename': {
      requirePositional(raw, 1, 'directory');
      return { command: 'rename', directory: raw.positional[0], dryRun: raw.flags.has('dry-run') };
    }
  }
}
