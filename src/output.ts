// Line protocol written to stdout. Verbosity counts -v flags:
//   1  hash → path for every stored entry
//   2  directory entry and postponed symlinks
//   3  raw listing failures
export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  console.log(line);
};

export class Output {
  constructor(
    readonly verbosity: number = 0,
    private readonly write: LineWriter = stdoutWriter,
  ) {}

  at(level: number, line: string): void {
    if (this.verbosity >= level) {
      this.write(line);
    }
  }

  stored(hash: string, remotePath: string): void {
    this.at(1, `${hash} → ${remotePath}`);
  }

  entering(remotePath: string): void {
    this.at(2, `Entering ${remotePath}`);
  }

  postponed(localPath: string): void {
    this.at(2, `Postponing symlink ${localPath}`);
  }

  listFailed(remotePath: string, message: string): void {
    this.at(3, `Listing ${remotePath} failed: ${message}`);
  }

  result(line: string): void {
    this.write(line);
  }
}
