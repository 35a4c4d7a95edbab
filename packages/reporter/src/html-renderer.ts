import type { DependencyTree } from "@orgdeps/core";
import type { InventoryReport } from "./domain.js";

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");

/** Serializes a value for a `<script>` body; `<` cannot close the element. */
export const serializeForScript = (value: unknown): string =>
  JSON.stringify(value).replace(/</g, "\\u003c");

export const buildRepositoryDataBlob = (report: InventoryReport): Record<string, DependencyTree> =>
  Object.fromEntries(report.repositories.map((repository) => [repository.name, repository.dependencies]));

const STYLES = `
      body { font-family: 'Inter', sans-serif; background-color: #f3f4f6; }
      .node { cursor: pointer; }
      .node text { font: 12px sans-serif; }
      .link { fill: none; stroke: #9CA3AF; stroke-width: 1px; stroke-opacity: 0.6; }
      .table-header { cursor: pointer; }
      .table-header:hover { background-color: #E5E7EB; }
`;

// Browser code: no template literals so it can live inside this one.
const CLIENT_SCRIPT = `
      const repoData = JSON.parse(document.getElementById("repo-data").textContent);
      const HEADERS = ["Name", "Type", "Downloads", "Version", "License", "Size", "Files", "Published", "Archived", "Introduced By"];
      const NUMERIC_COLUMNS = { 2: true, 5: true, 6: true };

      function createGraph(repoName) {
        const data = repoData[repoName];
        const container = document.getElementById("dependency-graph");
        const width = container.offsetWidth;
        const height = 600;
        const color = d3.scaleOrdinal(d3.schemeCategory10);

        const svg = d3.select(container).append("svg").attr("viewBox", [0, 0, width, height]);
        const g = svg.append("g");
        svg.call(d3.zoom().on("zoom", function (event) { g.attr("transform", event.transform); }));

        const root = d3.hierarchy({
          name: repoName,
          children: Object.entries(data).map(function (entry) {
            return {
              name: entry[0],
              children: Object.keys(entry[1].dependencies).map(function (childName) { return { name: childName }; }),
            };
          }),
        });
        const links = root.links();
        const nodes = root.descendants();

        const simulation = d3.forceSimulation(nodes)
          .force("link", d3.forceLink(links).distance(100))
          .force("charge", d3.forceManyBody().strength(-500))
          .force("x", d3.forceX(width / 2))
          .force("y", d3.forceY(height / 2));

        const link = g.selectAll(".link").data(links).join("line")
          .attr("class", "link")
          .attr("stroke", function (d) { return color(d.target.depth); });

        const node = g.selectAll(".node").data(nodes).join("g")
          .attr("class", "node")
          .call(drag(simulation));

        node.append("circle")
          .attr("r", function (d) { return 8 - d.depth * 1.5; })
          .attr("fill", function (d) { return color(d.depth); });

        node.append("text")
          .attr("dy", "0.31em")
          .attr("x", function (d) { return d.children ? -8 : 8; })
          .attr("text-anchor", function (d) { return d.children ? "end" : "start"; })
          .text(function (d) { return d.data.name; })
          .clone(true).lower()
          .attr("fill", "none")
          .attr("stroke", "white")
          .attr("stroke-width", 3);

        simulation.on("tick", function () {
          link
            .attr("x1", function (d) { return d.source.x; })
            .attr("y1", function (d) { return d.source.y; })
            .attr("x2", function (d) { return d.target.x; })
            .attr("y2", function (d) { return d.target.y; });
          node.attr("transform", function (d) { return "translate(" + d.x + "," + d.y + ")"; });
        });
      }

      function drag(simulation) {
        return d3.drag()
          .on("start", function (event, d) {
            if (!event.active) simulation.alphaTarget(0.3).restart();
            d.fx = d.x;
            d.fy = d.y;
          })
          .on("drag", function (event, d) {
            d.fx = event.x;
            d.fy = event.y;
          })
          .on("end", function (event, d) {
            if (!event.active) simulation.alphaTarget(0);
            d.fx = null;
            d.fy = null;
          });
      }

      function formatDate(value) {
        if (!value) return "N/A";
        return new Date(value).toLocaleDateString(undefined, { year: "numeric", month: "short", day: "numeric" });
      }

      function cell(text) {
        const td = document.createElement("td");
        td.className = "px-3 py-2 whitespace-nowrap text-sm text-gray-500";
        td.textContent = text;
        return td;
      }

      function toRepositoryApiUrl(url) {
        const cleaned = url.replace("git+", "").replace(/\\.git$/, "");
        return cleaned.indexOf("https://github.com/") === 0
          ? cleaned.replace("https://github.com/", "https://api.github.com/repos/")
          : null;
      }

      function loadArchivedStatus(target, repositoryUrl) {
        const apiUrl = repositoryUrl ? toRepositoryApiUrl(repositoryUrl) : null;
        if (!apiUrl) {
          target.textContent = "N/A";
          return;
        }
        fetch(apiUrl)
          .then(function (res) { if (!res.ok) throw new Error(String(res.status)); return res.json(); })
          .then(function (repo) { target.textContent = repo.archived ? "Yes" : "No"; })
          .catch(function () { target.textContent = "Unknown"; });
      }

      function addDependencyRow(tbody, name, info) {
        const row = document.createElement("tr");
        const nameCell = cell("");
        nameCell.className = "px-3 py-2 whitespace-nowrap text-sm font-medium text-gray-900";
        const anchor = document.createElement("a");
        anchor.href = "https://www.npmjs.com/package/" + name;
        anchor.target = "_blank";
        anchor.rel = "noopener";
        anchor.className = "text-blue-500 hover:underline";
        anchor.textContent = name;
        nameCell.appendChild(anchor);
        row.appendChild(nameCell);
        row.appendChild(cell(info.level === 0 ? "Direct" : "Indirect"));
        for (let i = 0; i < 7; i += 1) row.appendChild(cell("Loading..."));
        row.appendChild(cell(info.parent || "N/A"));
        tbody.appendChild(row);

        const cells = row.querySelectorAll("td");
        const encoded = encodeURIComponent(name).replace("%40", "@");
        Promise.all([
          fetch("https://registry.npmjs.org/" + encoded).then(function (res) { return res.json(); }),
          fetch("https://api.npmjs.org/downloads/point/last-month/" + encoded).then(function (res) { return res.json(); }),
        ]).then(function (responses) {
          const npmData = responses[0];
          const downloadData = responses[1];
          const latestVersion = npmData["dist-tags"].latest;
          const latestInfo = npmData.versions[latestVersion];
          const license = typeof latestInfo.license === "string"
            ? latestInfo.license
            : (latestInfo.license && latestInfo.license.type) || "N/A";
          const dist = latestInfo.dist || {};
          const repository = latestInfo.repository;
          const repositoryUrl = typeof repository === "string" ? repository : repository && repository.url;

          cells[2].textContent = (downloadData.downloads || 0).toLocaleString();
          cells[3].textContent = latestVersion;
          cells[4].textContent = license;
          cells[5].textContent = dist.unpackedSize ? (dist.unpackedSize / 1024).toFixed(2) + " KB" : "N/A";
          cells[6].textContent = dist.fileCount ? String(dist.fileCount) : "N/A";
          cells[7].textContent = formatDate(npmData.time && npmData.time[latestVersion]);
          loadArchivedStatus(cells[8], repositoryUrl);
        }).catch(function (error) {
          console.error("Error:", error);
          for (let i = 2; i < 9; i += 1) cells[i].textContent = "Error";
        });
      }

      function addDependencies(tbody, deps) {
        Object.entries(deps).forEach(function (entry) {
          addDependencyRow(tbody, entry[0], entry[1]);
          addDependencies(tbody, entry[1].dependencies);
        });
      }

      function compareCells(index, left, right) {
        if (NUMERIC_COLUMNS[index]) {
          return (parseFloat(left.replace(/,/g, "")) || 0) - (parseFloat(right.replace(/,/g, "")) || 0);
        }
        return left.localeCompare(right);
      }

      function createDependencyTable(repoName) {
        const container = document.getElementById("dependency-table");
        const title = document.createElement("h4");
        title.className = "text-xl font-semibold mb-4";
        title.textContent = "Dependencies";
        container.appendChild(title);

        const table = document.createElement("table");
        table.className = "min-w-full divide-y divide-gray-200";
        const thead = table.createTHead();
        thead.className = "bg-gray-50";
        const headerRow = thead.insertRow();
        HEADERS.forEach(function (label) {
          const th = document.createElement("th");
          th.scope = "col";
          th.className = "px-3 py-3 text-left text-xs font-medium text-gray-500 uppercase tracking-wider table-header";
          th.textContent = label;
          headerRow.appendChild(th);
        });
        const tbody = table.createTBody();
        tbody.className = "bg-white divide-y divide-gray-200";

        addDependencies(tbody, repoData[repoName]);
        container.appendChild(table);

        const headers = headerRow.querySelectorAll("th");
        headers.forEach(function (header, index) {
          header.addEventListener("click", function () {
            const direction = header.classList.contains("sort-asc") ? -1 : 1;
            const rows = Array.from(tbody.querySelectorAll("tr"));
            rows.sort(function (a, b) {
              return direction * compareCells(index, a.children[index].textContent, b.children[index].textContent);
            });
            tbody.append.apply(tbody, rows);
            headers.forEach(function (h) { h.classList.remove("sort-asc", "sort-desc"); });
            header.classList.toggle("sort-asc", direction === 1);
            header.classList.toggle("sort-desc", direction === -1);
          });
        });
      }

      document.getElementById("repo-select").addEventListener("change", function () {
        const repoName = this.value;
        const details = document.getElementById("repo-details");
        if (!repoName) {
          details.classList.add("hidden");
          return;
        }
        document.getElementById("repo-name").textContent = repoName;
        details.classList.remove("hidden");
        document.getElementById("dependency-graph").replaceChildren();
        document.getElementById("dependency-table").replaceChildren();
        createGraph(repoName);
        createDependencyTable(repoName);
      });
`;

const renderSummaryCard = (label: string, value: number, gradient: string): string => `
          <div class="bg-gradient-to-br ${gradient} p-6 rounded-lg text-white">
            <p class="text-lg font-semibold mb-2">${label}</p>
            <p class="text-3xl font-bold">${value}</p>
          </div>`;

export const renderHtmlReport = (report: InventoryReport): string => {
  const organization = escapeHtml(report.organization);
  const organizationUrl = `https://github.com/${encodeURIComponent(report.organization)}`;
  const options = report.repositories
    .map(
      (repository) =>
        `<option value="${escapeHtml(repository.name)}">${escapeHtml(repository.name)} (${repository.directDependencies} dependencies)</option>`,
    )
    .join("\n          ");

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${organization} Dependency Report</title>
    <script src="https://d3js.org/d3.v7.min.js"></script>
    <script src="https://cdn.tailwindcss.com"></script>
    <link href="https://fonts.googleapis.com/css2?family=Inter:wght@400;600;700&display=swap" rel="stylesheet" />
    <style>${STYLES}    </style>
  </head>
  <body class="bg-gray-100">
    <div class="container mx-auto px-4 py-8">
      <header class="bg-white shadow-lg rounded-lg mb-8 p-8">
        <h1 class="text-4xl font-bold text-gray-900 mb-2">Dependency Report</h1>
        <a href="${escapeHtml(organizationUrl)}" target="_blank" rel="noopener" class="text-2xl text-blue-600 hover:underline">${escapeHtml(organizationUrl)}</a>
        <p class="text-sm text-gray-500 mt-2">Generated: ${escapeHtml(report.generatedAt)}</p>
      </header>

      <div class="bg-white shadow-lg rounded-lg p-8 mb-8">
        <h2 class="text-2xl font-semibold mb-6">Summary</h2>
        <div class="grid grid-cols-2 md:grid-cols-4 gap-6">${renderSummaryCard("Total Repositories", report.summary.totalRepositories, "from-blue-500 to-blue-600")}${renderSummaryCard("NPM Repositories", report.summary.repositoriesWithDependencies, "from-green-500 to-green-600")}${renderSummaryCard("Direct Dependencies", report.summary.directDependencies, "from-yellow-500 to-yellow-600")}${renderSummaryCard("Transitive Dependencies", report.summary.transitiveDependencies, "from-red-500 to-red-600")}
        </div>
      </div>

      <div class="bg-white shadow rounded-lg p-6 mb-8">
        <h2 class="text-2xl font-semibold mb-4">Repository Analysis</h2>
        <select id="repo-select" class="block w-full bg-white border border-gray-300 rounded-md shadow-sm">
          <option value="">Select a repository</option>
          ${options}
        </select>
      </div>

      <div id="repo-details" class="bg-white shadow rounded-lg p-6 mb-8 hidden">
        <h3 id="repo-name" class="text-2xl font-semibold mb-4"></h3>
        <div id="dependency-graph" class="w-full h-[600px] border border-gray-300 rounded-lg mb-8"></div>
        <div id="dependency-table" class="overflow-x-auto"></div>
      </div>
    </div>

    <script id="repo-data" type="application/json">${serializeForScript(buildRepositoryDataBlob(report))}</script>
    <script>${CLIENT_SCRIPT}    </script>
  </body>
</html>
`;
};
