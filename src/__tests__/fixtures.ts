import { loadNewsConfig } from "../config.js";
import type { Transport } from "../fetch.js";
import { silentLogger } from "../logger.js";
import type { NewsContext } from "../news.js";

export const YAHOO_HOMEPAGE = `<!DOCTYPE html>
<html lang="en">
<head><title>Yahoo News</title></head>
<body>
  <ul>
    <li class="stream-item">
      <h3 data-test-locator="stream-item-title"><a href="/news/markets-rally-1.html">Markets rally on rate hopes</a></h3>
      <span data-test-locator="stream-item-publisher">Reuters</span>
      <span data-test-locator="stream-read-time">3 min read</span>
    </li>
    <li class="stream-item">
      <h3 data-test-locator="stream-item-title"><a href="/news/storm-warning-2.html">Storm warning issued</a></h3>
      <span data-test-locator="stream-item-publisher">Associated Press</span>
    </li>
  </ul>
</body>
</html>`;

export const HACKER_NEWS_HOMEPAGE = `<html><head><title>Hacker News</title></head><body><table>
<tr class="athing"><td class="title"><span class="titleline"><a href="item?id=2">Ask HN: Favorite tools?</a></span></td></tr>
<tr><td class="subtext"><span class="score">12 points</span> by <a class="hnuser">bob</a> <span class="age"><a>1 hour ago</a></span></td></tr>
<tr class="athing"><td class="title"><span class="titleline"><a href="https://example.org/post">Show HN: A tiny parser</a></span></td></tr>
<tr><td class="subtext"><span class="score">128 points</span> by <a class="hnuser">alice</a> <span class="age"><a>3 hours ago</a></span></td></tr>
</table></body></html>`;

export function respondWith(body: string, status = 200, url = ""): Transport {
  return async () => ({ status, url, body });
}

/** Never answers, rejects like fetch once the signal aborts */
export const hangingTransport: Transport = (_url, { signal }) =>
  new Promise((_resolve, reject) => {
    signal.addEventListener(
      "abort",
      () => {
        reject(new DOMException("This operation was aborted", "AbortError"));
      },
      { once: true }
    );
  });

export function testContext(transport: Transport, env: NodeJS.ProcessEnv = {}): NewsContext {
  return { config: loadNewsConfig(env), logger: silentLogger, transport };
}
