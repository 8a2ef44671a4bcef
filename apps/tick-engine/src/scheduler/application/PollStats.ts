export interface PollStats {
  polls: number;
  fired: number;
  failures: number;
}
