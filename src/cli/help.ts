import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('threadfold')} ${dimText('— fold message threads in a listing')}`
    : 'threadfold — fold message threads in a listing';

  const lines = [
    title,
    '',
    'Usage: threadfold <command> [listing.json] [options]',
    '',
    formatSection('Commands', [
      ['help', 'Show this help'],
      ['list', 'Print the listing with threads folded'],
      ['threads', 'Print thread boundaries and fold state'],
      ['view (v)', 'Full-screen interactive listing'],
    ]),
    '',
    formatSection('Global flags', [
      ['--config, -c <path>', 'Path to config file'],
      ['--folded', 'Fold every thread by default'],
      ['--unfolded', 'Show every thread expanded by default'],
      ['--fold-unread', 'Allow unread messages to be hidden'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Concepts', [
      ['Thread', 'A root message and the replies listed right after it'],
      ['Fold', 'Replies collapse into "[N hidden messages, M unread]"'],
      ['Stops', 'A fold never hides a marked message, nor an unread one unless --fold-unread'],
      ['Overrides', 'Threads folded or unfolded one by one keep their state when folds are re-applied'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .threadfold.json (walks up from cwd)'],
      ['Global config', '~/.config/threadfold/config.json'],
      ['Key fields', 'listing (path), foldUnread (boolean), defaultView (folded|unfolded)'],
    ]),
    '',
    dimText('Run `threadfold <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
