export interface UpstreamHealth {
  reachable: boolean;
  checkedAt: Date;
  /**
   * Short classification on failure: connection_refused, timeout, dns_failure,
   * invalid_endpoint, request_error or unexpected_status:<code>
   */
  detail?: string;
}

export type Probe = () => Promise<UpstreamHealth>;
