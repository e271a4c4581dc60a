export function exampleQueries(service: string): Record<string, string> {
  return {
    all_logs: `{service="${service}"}`,
    error_logs: `{service="${service}"} |= "ERROR"`,
    api_requests: '{log_type="http_request"}',
    recent_errors: `{service="${service}"} | json | level="ERROR"`,
    slow_requests: '{log_type="http_request"} | json | http_duration > 1.0'
  };
}

export const COMMON_PATTERNS: Record<string, string> = {
  filter_by_service: '{service="your-service"}',
  search_text: '{service="your-service"} |= "search term"',
  json_field: '{service="your-service"} | json | field="value"',
  regex_filter: '{service="your-service"} |~ "regex.*pattern"',
  time_range: 'Use start/end arguments for time ranges'
};

export const LOGQL_GUIDE_URL = 'https://grafana.com/docs/loki/latest/query/';
