import { steamWidgetUrl, type GameResult } from "@trailerbin/scraper";

export const DASHJS_URL = "https://cdnjs.cloudflare.com/ajax/libs/dashjs/4.7.4/dash.all.min.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const STYLES = `
        * { box-sizing: border-box; margin: 0; padding: 0; }
        body {
            font-family: 'Segoe UI', Arial, sans-serif;
            background: #1b2838;
            color: #c6d4df;
            padding: 24px;
        }
        h1 {
            color: #66c0f4;
            text-align: center;
            margin-bottom: 28px;
            font-size: 1.8rem;
            letter-spacing: 0.04em;
        }
        table {
            width: auto;
            margin: 0 auto;
            border-collapse: collapse;
            background: #16202d;
            border-radius: 10px;
            overflow: hidden;
            box-shadow: 0 6px 24px rgba(0,0,0,0.5);
        }
        thead { background: #1e3a5f; }
        th {
            padding: 14px 20px;
            text-align: left;
            font-size: 0.85rem;
            color: #66c0f4;
            text-transform: uppercase;
            letter-spacing: 0.08em;
        }
        td {
            padding: 18px 20px;
            border-bottom: 1px solid #2a3f5f;
            vertical-align: middle;
        }
        tr:last-child td { border-bottom: none; }
        tr:hover { background: #1a2e47; }
        .widget-cell { padding: 12px 20px; vertical-align: middle; }
        .widget-cell iframe { display: block; }
        .video-wrapper video {
            display: block;
            border-radius: 6px;
            background: #000;
            max-width: 100%;
        }
        .no-trailer { color: #7a8fa8; font-style: italic; }
        .error-msg { color: #e06c6c; font-size: 0.85rem; }`;

// Players are created on first hover; no manifest is fetched at page load.
const PLAYER_SCRIPT = `
    document.addEventListener('DOMContentLoaded', function () {
        document.querySelectorAll('video[data-mpd]').forEach(function (videoEl) {
            var mpdUrl = videoEl.getAttribute('data-mpd');
            if (!mpdUrl) return;

            var player = null;
            var ready = false;
            var pendingPlay = false;

            function initPlayer() {
                if (player) return;
                try {
                    player = dashjs.MediaPlayer().create();
                    player.initialize(videoEl, mpdUrl, false);
                    player.updateSettings({
                        streaming: { abr: { autoSwitchBitrate: { video: true } } }
                    });
                    player.on(dashjs.MediaPlayer.events.CAN_PLAY, function () {
                        ready = true;
                        if (pendingPlay) {
                            pendingPlay = false;
                            videoEl.play();
                        }
                    });
                } catch (err) {
                    videoEl.parentElement.innerHTML =
                        '<span class="error-msg">Could not initialise DASH player: ' + err.message + '</span>';
                }
            }

            videoEl.addEventListener('mouseenter', function () {
                if (!player) {
                    pendingPlay = true;
                    initPlayer();
                } else if (ready) {
                    videoEl.play();
                } else {
                    pendingPlay = true;
                }
            });

            videoEl.addEventListener('mouseleave', function () {
                pendingPlay = false;
                videoEl.pause();
            });
        });
    });`;

export function renderTrailerCell(result: GameResult): string {
  if (!result.mpdUrl) {
    return `<em class='no-trailer'>No trailer available</em>`;
  }
  return `
                <div class="video-wrapper">
                    <video
                        id="video-${escapeHtml(result.appid)}"
                        data-mpd="${escapeHtml(result.mpdUrl)}"
                        poster="${escapeHtml(result.headerImage)}"
                        muted
                        controls
                        width="960"
                        preload="none">
                    </video>
                </div>`;
}

export function renderRow(result: GameResult): string {
  return `
        <tr>
            <td class="widget-cell">
                <iframe src="${escapeHtml(steamWidgetUrl(result.appid))}"
                    title="${escapeHtml(result.name)}"
                    frameborder="0" width="646" height="190">
                </iframe>
            </td>
            <td class="trailer-cell">
                ${renderTrailerCell(result)}
            </td>
        </tr>`;
}

/** Renders one standalone page: a store widget and a hover-to-play trailer per game. */
export function buildHtml(results: readonly GameResult[], title: string): string {
  const rows = results.map(renderRow).join("");
  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Steam Games — ${escapeHtml(title)}</title>
    <script src="${DASHJS_URL}"></script>
    <style>${STYLES}
    </style>
</head>
<body>
    <h1>🎮 Steam Games</h1>
    <table>
        <thead>
            <tr><th>Store</th><th>Trailer</th></tr>
        </thead>
        <tbody>
            ${rows}
        </tbody>
    </table>
    <script>${PLAYER_SCRIPT}
    </script>
</body>
</html>
`;
}
