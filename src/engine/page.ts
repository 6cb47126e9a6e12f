import type { FileListing } from "../storage/storage.js";

export interface IndexView {
  url: string;
  qrDataUrl: string;
  folderName: string;
  listing: FileListing;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function fileRow(name: string, size: string): string {
  const href = `/files/${encodeURIComponent(name)}`;
  const label = escapeHtml(name);
  return `
        <div class="file-row">
          <div class="file-name"><a href="${escapeHtml(href)}">${label}</a></div>
          <div class="small text-muted">${escapeHtml(size)}</div>
          <div>
            <a class="btn btn-sm btn-outline-primary" href="${escapeHtml(href)}" download>Down</a>
            <button class="btn btn-sm btn-outline-danger ms-1" data-f="${label}" onclick="deleteFile(event, this)">Del</button>
          </div>
        </div>`;
}

function fileList(listing: FileListing): string {
  if (listing.names.length === 0) {
    return `<div class="small text-muted mt-2">No files yet. Upload something.</div>`;
  }
  return listing.names.map((name) => fileRow(name, listing.sizesByName[name] ?? "")).join("");
}

export function renderIndexPage(view: IndexView): string {
  const url = escapeHtml(view.url);
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width,initial-scale=1">
<title>LAN Share</title>
<link href="https://cdn.jsdelivr.net/npm/bootstrap@5.3.2/dist/css/bootstrap.min.css" rel="stylesheet">
<style>
body { padding-top: 30px; background: #f7f7fb; }
.share-card { max-width: 1000px; margin: auto; }
.file-row { display: flex; justify-content: space-between; align-items: center; padding: 8px 12px; border-bottom: 1px solid #eee; }
.file-name { overflow: hidden; text-overflow: ellipsis; white-space: nowrap; max-width: 60%; }
.drop-area { border: 2px dashed #ced4da; border-radius: 8px; padding: 18px; text-align: center; background: #fff; cursor: pointer; transition: border-color .2s; }
.drop-area:hover, .drop-area.over { border-color: #0d6efd; background: #f8f9fa; }
.small { font-size: .85rem; color: #666; }
</style>
</head>
<body>
<div class="container share-card">
  <div class="card shadow-sm">
    <div class="card-body">
      <div class="d-flex justify-content-between align-items-center mb-3">
        <div>
          <h4 class="mb-0">LAN Share</h4>
          <div class="small">Move files between this computer and your phone over the same Wi-Fi.</div>
        </div>
        <div class="d-flex align-items-center gap-3">
          <div class="text-end">
            <div class="small">Server URL</div>
            <div><a href="${url}">${url}</a></div>
          </div>
          <button onclick="stopServer()" class="btn btn-outline-danger btn-sm">Stop Server</button>
        </div>
      </div>

      <div class="row g-3">
        <div class="col-md-5">
          <div class="card p-3 mb-3">
            <div class="small mb-2">Scan to open on your phone</div>
            <div class="text-center">
              <img src="${escapeHtml(view.qrDataUrl)}" alt="QR code for ${url}" style="max-width:220px" class="img-fluid border rounded">
            </div>
          </div>

          <div class="card p-3">
            <div class="small mb-2">Upload files</div>
            <div id="drop" class="drop-area mb-2">Drop files here or tap to choose</div>
            <input id="fileInput" type="file" multiple style="display:none">
            <div id="progress" class="mt-3" style="display:none">
              <div class="d-flex justify-content-between small mb-1">
                <span id="progressLabel">Starting...</span>
                <span id="progressPercent">0%</span>
              </div>
              <div class="progress" style="height:10px">
                <div id="progressBar" class="progress-bar progress-bar-striped progress-bar-animated" role="progressbar" style="width:0%"></div>
              </div>
            </div>
            <div id="status" class="small text-success mt-2"></div>
          </div>
        </div>

        <div class="col-md-7">
          <div class="card p-3">
            <div class="d-flex justify-content-between align-items-center mb-2">
              <strong>Shared files</strong>
              <div class="small text-muted">/${escapeHtml(view.folderName)}</div>
            </div>
            <div id="files">${fileList(view.listing)}
            </div>
          </div>
        </div>
      </div>
    </div>
    <div class="card-footer small text-muted text-center">Keep this page open on the computer while you scan from the phone.</div>
  </div>
</div>

<script>
const drop = document.getElementById("drop");
const fileInput = document.getElementById("fileInput");
const progress = document.getElementById("progress");
const progressBar = document.getElementById("progressBar");
const progressLabel = document.getElementById("progressLabel");
const progressPercent = document.getElementById("progressPercent");
const statusLine = document.getElementById("status");

function setProgress(percent, label) {
  progressBar.style.width = percent + "%";
  progressPercent.textContent = percent + "%";
  progressLabel.textContent = label;
}

drop.addEventListener("click", () => fileInput.click());
drop.addEventListener("dragover", (e) => { e.preventDefault(); drop.classList.add("over"); });
drop.addEventListener("dragleave", (e) => { e.preventDefault(); drop.classList.remove("over"); });
drop.addEventListener("drop", (e) => {
  e.preventDefault();
  drop.classList.remove("over");
  uploadFiles(Array.from(e.dataTransfer.files));
});
fileInput.addEventListener("change", () => {
  uploadFiles(Array.from(fileInput.files));
  fileInput.value = null;
});

function uploadFiles(files) {
  if (files.length === 0) return;

  progress.style.display = "block";
  statusLine.textContent = "";
  setProgress(0, "Uploading " + files.length + " file(s)...");

  const form = new FormData();
  files.forEach((f) => form.append("file", f));

  const xhr = new XMLHttpRequest();
  xhr.open("POST", "/upload", true);
  xhr.upload.onprogress = (e) => {
    if (!e.lengthComputable) return;
    const percent = Math.round((e.loaded / e.total) * 100);
    setProgress(percent, percent + "% sent");
  };
  xhr.onload = () => {
    if (xhr.status === 200) {
      setProgress(100, "Processing...");
      setTimeout(() => {
        statusLine.textContent = "Upload complete!";
        progress.style.display = "none";
        location.reload();
      }, 800);
    } else {
      progressLabel.textContent = "Error";
      statusLine.textContent = "Upload failed.";
    }
  };
  xhr.onerror = () => {
    progressLabel.textContent = "Error";
    statusLine.textContent = "Network error.";
  };
  xhr.send(form);
}

async function deleteFile(e, el) {
  e.preventDefault();
  const name = el.getAttribute("data-f");
  if (!confirm("Delete " + name + " ?")) return;
  try {
    const res = await fetch("/delete/" + encodeURIComponent(name));
    if (res.ok) location.reload();
  } catch (err) {
    console.error(err);
    alert("Delete failed");
  }
}

async function stopServer() {
  if (!confirm("Stop the server? Everyone connected will lose access.")) return;
  try {
    await fetch("/shutdown", { method: "POST" });
    document.body.innerHTML = '<div style="display:flex;justify-content:center;align-items:center;height:100vh;flex-direction:column"><h2>Server stopped</h2><p>You can close this tab now.</p></div>';
  } catch (err) {
    alert("Could not stop the server, or it has already stopped.");
  }
}
</script>
</body>
</html>
`;
}
