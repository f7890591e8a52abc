/**
 * Client Script - the browser side of the dashboard
 * Everything runs on the JSON embedded in the page; nothing is fetched.
 */

import { SHELL_QUOTE_ESCAPE } from './curl-generator';

export const THEME_STORAGE_KEY = 'junit-fuzz-dashboard-theme';

/**
 * Pure filtering and curl helpers, free of DOM access so they can run anywhere
 */
export function generateFilterEngineScript(): string {
  return `
    var SHELL_QUOTE_ESCAPE = ${JSON.stringify(SHELL_QUOTE_ESCAPE)};

    function shellQuote(value) {
      return "'" + String(value).split("'").join(SHELL_QUOTE_ESCAPE) + "'";
    }

    function buildCurl(record) {
      var request = record.request || {};
      if (!request.url) return null;
      var parts = ['curl', '-X', request.method || 'GET', shellQuote(request.url)];
      (request.headers || []).forEach(function(header) {
        parts.push('-H', shellQuote(header[0] + ': ' + header[1]));
      });
      if (request.body) parts.push('-d', shellQuote(request.body));
      return parts.join(' ');
    }

    function isRecordVisible(record, state) {
      if (state.activeStatusFilter !== 'all' && record.statusCodeClass !== state.activeStatusFilter) {
        return false;
      }
      var search = (state.searchText || '').toLowerCase();
      if (search &&
          record.endpoint.toLowerCase().indexOf(search) === -1 &&
          record.suiteName.toLowerCase().indexOf(search) === -1) {
        return false;
      }
      return record.durationSeconds <= state.maxDurationFilter;
    }

    function filterGroups(groups, state) {
      return groups
        .map(function(group) {
          return {
            endpoint: group.endpoint,
            records: group.records.filter(function(record) { return isRecordVisible(record, state); })
          };
        })
        .filter(function(group) { return group.records.length > 0; });
    }

    function escapeHtml(value) {
      return String(value)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#039;');
    }

    function pillClass(code) {
      if (typeof code !== 'number') return 'pill-unk';
      if (code >= 500 && code < 600) return 'pill-5xx';
      if (code >= 400 && code < 500) return 'pill-4xx';
      if (code >= 200 && code < 300) return 'pill-2xx';
      return 'pill-unk';
    }
`;
}

/**
 * DOM wiring: card rendering, filters, modal, clipboard and theme
 */
export function generateClientScript(): string {
  return `(function() {
${generateFilterEngineScript()}

    var dataEl = document.getElementById('report-data');
    var report = JSON.parse((dataEl && dataEl.textContent) || '{}');
    var groups = report.groups || [];
    var summary = report.summary || { minDuration: 0, maxDuration: 0, totalFailed: 0 };

    // Flat index so cards can refer to records by position
    var records = [];
    groups.forEach(function(group) {
      group.records.forEach(function(record) {
        record.idx = records.length;
        records.push(record);
      });
    });

    var state = {
      activeStatusFilter: 'all',
      searchText: '',
      maxDurationFilter: summary.maxDuration
    };

    var groupsEl = document.getElementById('groups');
    var emptyEl = document.getElementById('empty-state');
    var countEl = document.getElementById('visible-count');
    var searchEl = document.getElementById('search');
    var sliderEl = document.getElementById('duration-filter');
    var sliderValueEl = document.getElementById('duration-value');
    var backdropEl = document.getElementById('modal-backdrop');
    var copyBtn = document.getElementById('modal-copy-curl');
    var curlPre = document.getElementById('modal-curl');
    var currentCurl = null;

    function renderCard(record) {
      var curl = buildCurl(record);
      var code = typeof record.statusCode === 'number' ? String(record.statusCode) : 'n/a';
      return '<article class="failure-card status-' + record.statusCodeClass + '" data-idx="' + record.idx + '" tabindex="0">' +
        '<div class="card-top">' +
          '<span class="pill ' + pillClass(record.statusCode) + '">' + code + '</span>' +
          '<span class="status-tag">' + escapeHtml(record.status) + '</span>' +
          (record.kind ? '<span class="card-kind">' + escapeHtml(record.kind) + '</span>' : '') +
          '<span class="card-duration">' + record.durationSeconds.toFixed(3) + 's</span>' +
        '</div>' +
        '<div class="card-test">' + escapeHtml(record.testName) + '</div>' +
        '<div class="card-suite">' + escapeHtml(record.suiteName) + '</div>' +
        '<p class="card-message">' + escapeHtml(record.message) + '</p>' +
        (curl ? '<button class="btn btn-copy" type="button" data-copy-idx="' + record.idx + '">Copy curl</button>' : '') +
      '</article>';
    }

    function renderCards() {
      var visible = filterGroups(groups, state);
      var shown = 0;
      groupsEl.innerHTML = visible.map(function(group) {
        shown += group.records.length;
        return '<section class="endpoint-group">' +
          '<header class="group-header">' +
            '<span class="group-endpoint">' + escapeHtml(group.endpoint) + '</span>' +
            '<span class="group-count">' + group.records.length + '</span>' +
          '</header>' +
          '<div class="card-grid">' + group.records.map(renderCard).join('') + '</div>' +
        '</section>';
      }).join('');
      emptyEl.style.display = shown === 0 ? 'block' : 'none';
      countEl.textContent = 'Showing ' + shown + ' of ' + records.length + ' failures';
    }

    function showToast(message) {
      var toast = document.getElementById('toast');
      toast.textContent = message;
      toast.classList.add('visible');
      setTimeout(function() { toast.classList.remove('visible'); }, 1800);
    }

    function fallbackCopy(text) {
      var textarea = document.createElement('textarea');
      textarea.value = text;
      textarea.style.position = 'fixed';
      textarea.style.left = '-9999px';
      document.body.appendChild(textarea);
      textarea.select();
      try {
        document.execCommand('copy');
        showToast('curl copied');
      } catch (e) {
        showToast('Copy failed');
      }
      document.body.removeChild(textarea);
    }

    function copyText(text) {
      if (navigator.clipboard && navigator.clipboard.writeText) {
        navigator.clipboard.writeText(text)
          .then(function() { showToast('curl copied'); })
          .catch(function() { fallbackCopy(text); });
      } else {
        fallbackCopy(text);
      }
    }

    function copyCurl(record) {
      var curl = buildCurl(record);
      if (curl) copyText(curl);
    }

    function openModal(record) {
      document.getElementById('modal-title').textContent = record.endpoint;
      document.getElementById('modal-meta').innerHTML =
        '<span class="pill ' + pillClass(record.statusCode) + '">' +
          (typeof record.statusCode === 'number' ? record.statusCode : 'n/a') + '</span>' +
        '<span class="meta-item">' + escapeHtml(record.suiteName) + '</span>' +
        '<span class="meta-item">' + escapeHtml(record.testName) + '</span>' +
        '<span class="meta-item">' + record.durationSeconds.toFixed(3) + 's</span>' +
        (record.kind ? '<span class="meta-item">' + escapeHtml(record.kind) + '</span>' : '');
      document.getElementById('modal-full-text').textContent = record.fullText || '(no failure text)';
      currentCurl = buildCurl(record);
      curlPre.textContent = currentCurl || '';
      curlPre.style.display = currentCurl ? 'block' : 'none';
      copyBtn.style.display = currentCurl ? 'inline-flex' : 'none';
      backdropEl.classList.add('open');
    }

    function closeModal() {
      backdropEl.classList.remove('open');
      currentCurl = null;
    }

    function setStatusFilter(mode) {
      state.activeStatusFilter = mode;
      document.querySelectorAll('.filter-btn').forEach(function(btn) {
        btn.classList.toggle('active', btn.getAttribute('data-mode') === mode);
      });
      renderCards();
    }

    function updateSliderLabel() {
      sliderValueEl.textContent = '\\u2264 ' + state.maxDurationFilter.toFixed(3) + 's';
    }

    function resetFilters() {
      state.searchText = '';
      state.maxDurationFilter = summary.maxDuration;
      searchEl.value = '';
      sliderEl.value = String(summary.maxDuration);
      updateSliderLabel();
      setStatusFilter('all');
    }

    function applyTheme(theme) {
      document.documentElement.classList.toggle('light', theme === 'light');
      var btn = document.getElementById('theme-toggle');
      if (btn) btn.textContent = theme === 'light' ? 'Dark theme' : 'Light theme';
      try { localStorage.setItem('${THEME_STORAGE_KEY}', theme); } catch (e) { /* storage disabled for file:// pages */ }
    }

    function currentTheme() {
      return document.documentElement.classList.contains('light') ? 'light' : 'dark';
    }

    function savedTheme() {
      try { return localStorage.getItem('${THEME_STORAGE_KEY}'); } catch (e) { return null; }
    }

    groupsEl.addEventListener('click', function(e) {
      var copyTarget = e.target.closest('[data-copy-idx]');
      if (copyTarget) {
        e.stopPropagation();
        copyCurl(records[Number(copyTarget.getAttribute('data-copy-idx'))]);
        return;
      }
      var card = e.target.closest('.failure-card');
      if (card) openModal(records[Number(card.getAttribute('data-idx'))]);
    });

    groupsEl.addEventListener('keydown', function(e) {
      if (e.key !== 'Enter') return;
      var card = e.target.closest('.failure-card');
      if (card) openModal(records[Number(card.getAttribute('data-idx'))]);
    });

    document.querySelectorAll('.filter-btn').forEach(function(btn) {
      btn.addEventListener('click', function() { setStatusFilter(btn.getAttribute('data-mode')); });
    });

    searchEl.addEventListener('input', function() {
      state.searchText = searchEl.value;
      renderCards();
    });

    sliderEl.addEventListener('input', function() {
      var value = parseFloat(sliderEl.value);
      state.maxDurationFilter = isNaN(value) ? summary.maxDuration : value;
      updateSliderLabel();
      renderCards();
    });

    document.getElementById('reset-filters').addEventListener('click', resetFilters);
    document.getElementById('modal-close').addEventListener('click', closeModal);
    backdropEl.addEventListener('click', function(e) { if (e.target === backdropEl) closeModal(); });
    copyBtn.addEventListener('click', function() { if (currentCurl) copyText(currentCurl); });
    document.addEventListener('keydown', function(e) { if (e.key === 'Escape') closeModal(); });
    document.getElementById('theme-toggle').addEventListener('click', function() {
      applyTheme(currentTheme() === 'light' ? 'dark' : 'light');
    });

    applyTheme(savedTheme() || document.documentElement.getAttribute('data-default-theme') || 'dark');
    document.body.classList.add('js-enabled');
    updateSliderLabel();
    renderCards();
  })();`;
}
