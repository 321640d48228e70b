import type { GraphData, GraphTable } from './types.js';

export type Metric = 'wall' | 'memory';

export const METRIC_LABELS: Record<Metric, string> = {
  wall: 'Wall Time (s)',
  memory: 'Memory (MB)',
};

export interface ChartDescriptor {
  id: string;
  platform: string;
  metric: Metric;
  title: string;
  hAxisTitle: string;
  vAxisTitle: string;
  table: GraphTable;
}

export interface ReportSection {
  platform: string;
  charts: ChartDescriptor[];
}

export interface ReportDocument {
  project: string;
  date: string;
  sections: ReportSection[];
}

export function chartDescriptor(platform: string, metric: Metric, table: GraphTable): ChartDescriptor {
  const label = METRIC_LABELS[metric];
  return {
    id: `${platform}-${metric}`,
    platform,
    metric,
    title: `[${platform}] Bar Chart of ${label} vs Runs`,
    hAxisTitle: label,
    vAxisTitle: 'Runs (chronological order)',
    table,
  };
}

/** Collects one section per platform in the order platforms are added. */
export class ReportBuilder {
  private sections: ReportSection[] = [];

  constructor(private project: string, private date: string) {}

  addPlatform(platform: string, data: GraphData): this {
    this.sections.push({
      platform,
      charts: [
        chartDescriptor(platform, 'wall', data.wall),
        chartDescriptor(platform, 'memory', data.memory),
      ],
    });
    return this;
  }

  build(): ReportDocument {
    return { project: this.project, date: this.date, sections: [...this.sections] };
  }
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** JSON that is safe inside a <script> element. */
function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function toArrayTable(table: GraphTable): Array<Array<string | number>> {
  return [table.columns, ...table.rows];
}

function renderChart(chart: ChartDescriptor): string {
  const options = {
    title: chart.title,
    hAxis: { title: chart.hAxisTitle, minValue: 0 },
    vAxis: { title: chart.vAxisTitle },
    bars: 'horizontal',
    axes: { y: { 0: { side: 'right' } } },
    isStacked: true,
  };
  return `
<div class="col-sm-10">
  <div id="${escapeHtml(chart.id)}" class="chart" style="height: 800px"></div>
  <script type="text/javascript">
    google.charts.setOnLoadCallback(function () {
      var data = google.visualization.arrayToDataTable(${scriptJson(toArrayTable(chart.table))});
      var options = ${scriptJson(options)};
      var chart = new google.visualization.BarChart(document.getElementById(${scriptJson(chart.id)}));
      chart.draw(data, options);
    });
  </script>
</div>`;
}

function renderSection(section: ReportSection): string {
  return `
<div class="row">
  <div class="col-sm-5"><h2>${escapeHtml(section.platform)}</h2></div>
</div>
<div class="row">${section.charts.map(renderChart).join('\n')}
</div>`;
}

export function renderReport(report: ReportDocument): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>[${escapeHtml(report.project)}] Report for ${escapeHtml(report.date)}</title>
    <script type="text/javascript" src="https://www.gstatic.com/charts/loader.js"></script>
    <script type="text/javascript">
      google.charts.load("current", { packages: ["corechart"] });
    </script>
    <link rel="stylesheet" href="https://stackpath.bootstrapcdn.com/bootstrap/4.3.1/css/bootstrap.min.css" crossorigin="anonymous">
  </head>
  <body style="font-family: Roboto;">
    <div class="container-fluid">
      <div class="row">
        <div class="col-sm-12">
          <h1>[${escapeHtml(report.project)}] Report for ${escapeHtml(report.date)}</h1>
        </div>
      </div>
${report.sections.map(renderSection).join('\n')}
    </div>
  </body>
</html>
`;
}
