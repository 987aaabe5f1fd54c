import dns from "dns";
import { ResolutionOutcome, AbsenceReason } from "../models/geo-data";
import { errorMessage, InvalidAddressError } from "./errors";
import { IntervalIndex } from "./interval-index";
import { IpUtil } from "./ip-util";
import { normalizeEndpoint } from "./endpoint-util";
import { mapWithConcurrency } from "./concurrency-util";

/**
 * Resolves a hostname to its IPv4 addresses, in the order the resolver
 * returned them
 */
export interface HostResolver {
  resolveIpv4(hostname: string): Promise<string[]>;
}

/**
 * Resolver backed by the operating system (getaddrinfo), restricted to IPv4
 */
export class SystemResolver implements HostResolver {
  async resolveIpv4(hostname: string): Promise<string[]> {
    const results = await dns.promises.lookup(hostname, {
      family: 4,
      all: true,
    });
    return results.map((result) => result.address);
  }
}

export interface PipelineOptions {
  /** Maximum simultaneous resolutions, 0 for no limit */
  concurrency?: number;
  /** Per-hostname resolution timeout, 0 for none */
  timeoutMs?: number;
  /** Report each absent endpoint on console.warn */
  verbose?: boolean;
}

/**
 * Resolves relay endpoints and locates the resulting addresses in an
 * IntervalIndex
 */
export class ResolutionPipeline {
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;

  constructor(
    private readonly index: IntervalIndex,
    private readonly resolver: HostResolver = new SystemResolver(),
    options: PipelineOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 0;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Resolve and locate every endpoint. Outcomes line up with the input
   * positions whatever order the resolutions finish in.
   */
  async run(endpoints: ReadonlyArray<string>): Promise<ResolutionOutcome[]> {
    return mapWithConcurrency(endpoints, this.concurrency, (endpoint) =>
      this.resolveAndLocate(endpoint)
    );
  }

  /**
   * Resolve a single endpoint. Never rejects on resolution problems: every
   * failure becomes an absent outcome.
   */
  async resolveAndLocate(endpoint: string): Promise<ResolutionOutcome> {
    const hostname = normalizeEndpoint(endpoint);
    if (!hostname) {
      return this.absent(endpoint, "empty-hostname");
    }

    let addresses: string[];
    try {
      addresses = await this.resolveWithTimeout(hostname);
    } catch (error) {
      return this.absent(
        endpoint,
        "resolution-failed",
        `Resolution failed for ${hostname}: ${errorMessage(error)}`
      );
    }

    if (addresses.length === 0) {
      return this.absent(endpoint, "no-address");
    }

    // First address wins; the resolver's order is taken as-is
    const ip = addresses[0];

    let ipNum: number;
    try {
      ipNum = IpUtil.parseIpv4(ip);
    } catch (error) {
      if (!(error instanceof InvalidAddressError)) throw error;
      return this.absent(endpoint, "invalid-address", error.message);
    }

    const location = this.index.lookup(ipNum);
    if (!location) {
      return this.absent(
        endpoint,
        "no-match",
        `Geolocation failed for ${hostname} (${ip})`
      );
    }

    return {
      status: "located",
      endpoint,
      latitude: location.latitude,
      longitude: location.longitude,
    };
  }

  private async resolveWithTimeout(hostname: string): Promise<string[]> {
    if (this.timeoutMs <= 0) {
      return this.resolver.resolveIpv4(hostname);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs
      );
    });

    try {
      return await Promise.race([this.resolver.resolveIpv4(hostname), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private absent(
    endpoint: string,
    reason: AbsenceReason,
    detail?: string
  ): ResolutionOutcome {
    if (this.verbose) {
      console.warn(detail ?? `No location for ${endpoint} (${reason})`);
    }
    return { status: "absent", endpoint, reason };
  }
}
