/**
 * Append a Geohash column to a relays CSV produced by relay-geo
 */
import path from "path";
import { addGeohashColumn } from "../services/geohash-column-service";

// Parse command line arguments
function parseArgs(): { [key: string]: string | undefined } {
  const args: { [key: string]: string | undefined } = {};

  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      args.help = "true";
    } else if (arg.startsWith("--")) {
      args[arg.substring(2)] = argv[++i];
    }
  }

  return args;
}

function printUsage(): void {
  console.log("Usage: add-geohash --input <csv> [options]");
  console.log("");
  console.log("Options:");
  console.log("  --input <file>       CSV containing Relay URL,Latitude,Longitude");
  console.log(
    "  --output <file>      Output CSV (default: <input>_geohash.csv)"
  );
  console.log("  --precision <n>      Geohash precision (default: 7)");
}

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.help || !args.input) {
    printUsage();
    process.exit(args.help ? 0 : 1);
  }

  const precision = args.precision ? parseInt(args.precision, 10) : 7;
  if (isNaN(precision) || precision < 1) {
    console.error(`Invalid precision: ${args.precision}`);
    process.exit(1);
  }

  const inputPath = path.resolve(process.cwd(), args.input);
  const parsed = path.parse(inputPath);
  const outputPath = args.output
    ? path.resolve(process.cwd(), args.output)
    : path.join(parsed.dir, `${parsed.name}_geohash${parsed.ext}`);

  const processed = await addGeohashColumn(inputPath, outputPath, precision);
  console.log(`Wrote ${processed} rows to ${outputPath}`);
}

main().catch((error) => {
  console.error("Error adding geohash column:", error);
  process.exit(1);
});
