export class RunStats {
  calls = 0;

  failures = 0;

  abandoned = 0;
}
