/**
 * Tendency Report CLI
 *
 * Prints a team's offensive and/or defensive tendencies with league ranks
 * under the given situational filters.
 *
 * Usage:
 *   npm run report -- --team PHI --weeks 1,2,3 --downs 3 --distance 1-3
 *   npm run report -- --team DAL --side defense --vs-personnel 12
 */

import * as dotenv from 'dotenv';
import { Command } from 'commander';
import { loadPlayDataset } from '../dataset';
import { createLogger } from '../lib/logger';
import { formatPct, formatPercentageWithRank } from '../rankings/format';
import { DefenseCategoryRow } from '../tendencies/defense';
import { OffenseCategoryRow } from '../tendencies/offense';
import { DefenseView, OffenseView, TendencyEngine } from '../tendency-views';
import { toReportArgs } from './args';

dotenv.config();

const log = createLogger('Report');

function flatten(entries: string): string {
  return entries === '' ? '-' : entries.split('\n').join(' | ');
}

function printOffenseTable(title: string, rows: OffenseCategoryRow[]): void {
  console.log(`\n${title}`);
  if (rows.length === 0) {
    console.log('   (no plays)');
    return;
  }
  console.log(
    `   ${'Group'.padEnd(14)}${'Plays'.padStart(6)}${'Usage'.padStart(8)}${'Run'.padStart(8)}` +
      `${'PA'.padStart(8)}${'DB'.padStart(8)}${'Motion'.padStart(8)}  Top Run Concepts`
  );
  for (const row of rows) {
    console.log(
      `   ${row.category.padEnd(14)}${String(row.plays).padStart(6)}${formatPct(row.usagePct).padStart(8)}` +
        `${formatPct(row.runPct).padStart(8)}${formatPct(row.paPct).padStart(8)}${formatPct(row.dbPct).padStart(8)}` +
        `${formatPct(row.motionPct).padStart(8)}  ${flatten(row.topRunConcepts)}`
    );
  }
}

function printDefenseTable(title: string, rows: DefenseCategoryRow[]): void {
  console.log(`\n${title}`);
  if (rows.length === 0) {
    console.log('   (no plays)');
    return;
  }
  console.log(
    `   ${'Package'.padEnd(14)}${'Plays'.padStart(6)}${'Usage'.padStart(8)}${'Blitz'.padStart(8)}` +
      `${'Man'.padStart(8)}${'MOFO'.padStart(8)}${'Disg'.padStart(8)}  Top Coverages`
  );
  for (const row of rows) {
    console.log(
      `   ${row.category.padEnd(14)}${String(row.plays).padStart(6)}${formatPct(row.usagePct).padStart(8)}` +
        `${formatPct(row.blitzPct).padStart(8)}${formatPct(row.manPct).padStart(8)}${formatPct(row.mofoPct).padStart(8)}` +
        `${formatPct(row.disguisePct).padStart(8)}  ${flatten(row.topCoverages)}`
    );
  }
}

function printOffense(view: OffenseView): void {
  console.log(`\n🏈 ${view.team} Offensive Tendencies (${view.league.length} teams ranked)`);
  if (view.overall.totalPlays === 0) {
    console.log('   No data available for selected filters.');
    return;
  }

  const { overall, ranks } = view;
  console.log(`   Total Plays: ${overall.totalPlays}`);
  console.log(`   Run %:       ${formatPercentageWithRank(overall.runPct, ranks.runPct)}`);
  console.log(`   PA %:        ${formatPercentageWithRank(overall.paPct, ranks.paPct)}`);
  console.log(`   Std DB %:    ${formatPercentageWithRank(overall.dbPct, ranks.dbPct)}`);
  console.log(`   Motion %:    ${formatPercentageWithRank(overall.motionPct, ranks.motionPct)}`);
  console.log(`   Top Run Concepts: ${overall.topRunConcepts.join(' | ') || 'N/A'}`);

  printOffenseTable('Personnel Groupings', view.personnel);
  printOffenseTable('Formation Groups', view.formation);
  printOffenseTable('QB Alignment', view.qbAlignment);
}

function printDefense(view: DefenseView): void {
  console.log(`\n🛡️  ${view.team} Defensive Tendencies (${view.league.length} teams ranked)`);
  if (view.overall.totalPlays === 0) {
    console.log('   No defensive data available for selected filters.');
    return;
  }

  const { overall, ranks } = view;
  console.log(`   Total Plays: ${overall.totalPlays} (${overall.passPlays} pass)`);
  console.log(`   Blitz %:     ${formatPercentageWithRank(overall.blitzPct, ranks.blitzPct)}`);
  console.log(`   Man %:       ${formatPercentageWithRank(overall.manPct, ranks.manPct)}`);
  console.log(`   MOFO %:      ${formatPercentageWithRank(overall.mofoPct, ranks.mofoPct)}`);
  console.log(`   Disguise %:  ${formatPercentageWithRank(overall.disguisePct, ranks.disguisePct)}`);
  console.log(`   Top Coverages: ${overall.topCoverages.join(' | ') || 'N/A'}`);

  printDefenseTable('Defensive Packages', view.packages);
  if (view.versusPersonnel) {
    printDefenseTable(`Packages vs ${view.versusPersonnel.personnel} Personnel`, view.versusPersonnel.packages);
  }
}

/**
 * Main entry point
 */
function main(): void {
  const program = new Command();

  program
    .requiredOption('--team <code>', 'Team code, e.g. PHI')
    .option('--side <side>', 'offense, defense or both', 'both')
    .option('--weeks <list>', 'Comma-separated weeks (1-18, WC, DP, CC, SB)')
    .option('--quarters <list>', 'Comma-separated quarters')
    .option('--downs <list>', 'Comma-separated downs')
    .option('--time <range>', 'Minutes remaining in quarter, MIN-MAX')
    .option('--distance <range>', 'Yards to go, MIN-MAX')
    .option('--yardline <range>', 'Yards to goal line, MIN-MAX')
    .option('--vs-personnel <group>', 'Offensive personnel for the defensive package table')
    .option('--data <path>', 'Play feed CSV (overrides config and TENDENCY_DATA_PATH)')
    .action((options: Record<string, unknown>) => {
      try {
        const args = toReportArgs(options);
        const engine = new TendencyEngine(loadPlayDataset({ dataPath: args.dataPath }));

        if (!engine.filterOptions().teams.includes(args.team)) {
          log.warn(`Team ${args.team} has no plays in the feed`);
        }

        if (args.side !== 'defense') {
          printOffense(engine.offenseView(args.team, args.filters));
        }
        if (args.side !== 'offense') {
          printDefense(engine.defenseView(args.team, args.filters, { versusPersonnel: args.versusPersonnel }));
        }
      } catch (error) {
        console.error('❌ Error building tendency report:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });

  program.parse(process.argv);
}

main();
