import type { Command } from 'commander';
import kleur from 'kleur';

type Stylizer = (text: string) => string;

interface HelpColors {
  banner: Stylizer;
  subtitle: Stylizer;
  section: Stylizer;
  bullet: Stylizer;
  command: Stylizer;
  muted: Stylizer;
  accent: Stylizer;
}

export function helpColors(isTty: boolean): HelpColors {
  const wrap =
    (styler: Stylizer): Stylizer =>
    (text) =>
      isTty ? styler(text) : text;
  return {
    banner: wrap((text) => kleur.bold().blue(text)),
    subtitle: wrap((text) => kleur.dim(text)),
    section: wrap((text) => kleur.bold().white(text)),
    bullet: wrap((text) => kleur.blue(text)),
    command: wrap((text) => kleur.bold().blue(text)),
    muted: wrap((text) => kleur.gray(text)),
    accent: wrap((text) => kleur.cyan(text)),
  };
}

/** Adds the banner above every help screen and the tips below the root one. */
export function applyHelpStyling(program: Command, version: string, isTty: boolean): void {
  const colors = helpColors(isTty);
  program.addHelpText('beforeAll', () => renderHelpBanner(version, colors));
  program.addHelpText('after', () => renderHelpFooter(program.name(), colors));
}

export function renderHelpBanner(version: string, colors: Pick<HelpColors, 'banner' | 'subtitle'>): string {
  const subtitle = 'run browser tests in a throwaway Chrome profile';
  return `${colors.banner(`webharness v${version}`)} ${colors.subtitle(`(${subtitle})`)}\n`;
}

export function renderHelpFooter(name: string, colors: HelpColors): string {
  const bullet = colors.bullet('•');
  const tips = [
    `${bullet} The harness page reports its result by logging ${colors.accent('"tests finished - passed"')} or ${colors.accent('"tests finished - failed"')} to the console.`,
    `${bullet} Every console line resets the idle timer; a silent page times out after ${colors.accent('--timeout')} (default 60s).`,
    `${bullet} Extra Chrome switches come from ${colors.accent('--browser-arg')}, the config file and ${colors.accent('CHROME_ARGS')}, in that order.`,
    `${bullet} Exit codes: 0 passed, 1 failed, 2 timed out, 3 harness error.`,
  ];

  const examples: Array<[string, string]> = [
    [`${name} run test`, 'Serve ./test and run test/index.html in the best available Chrome.'],
    [
      `${name} run build/web --html-file runner.html --timeout 2m`,
      'Run a built harness page against an installed Chrome with a two minute idle limit.',
    ],
    [`${name} browsers`, 'List which browser variants exist on this machine.'],
    [`${name} open coverage/index.html`, 'Open a local file in a fresh profile and wait until it is closed.'],
  ];

  return [
    '',
    colors.section('Tips'),
    ...tips,
    '',
    colors.section('Examples'),
    examples
      .map(([command, description]) => `${colors.command(`  ${command}`)}\n${colors.muted(`    ${description}`)}`)
      .join('\n\n'),
    '',
  ].join('\n');
}
