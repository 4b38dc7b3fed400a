export interface DnsCheckResult {
  success: boolean;
  address: string | null;
  error: string | null;
}

export interface HttpProbeResult {
  success: boolean;
  status: number | null;
  server: string | null; // Server header, "Unknown" when absent
  url: string | null; // URL that answered
  error: string | null;
}

export interface VerificationResult {
  verified: boolean;
  domain: string | null;
  dnsValid: boolean;
  dnsIp: string | null;
  httpResponds: boolean;
  httpStatus: number | null;
  server: string | null;
  url: string | null;
  error: string | null;
}

export interface VerifyOptions {
  requireDns?: boolean;
  requireHttp?: boolean;
}
