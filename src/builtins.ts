import {
  Library,
} from './library.js';

import { filterDate } from './filters/date.js';
import { filterDefault } from './filters/default.js';
import { filterEscape } from './filters/escape.js';
import { filterJoin } from './filters/join.js';
import { filterJson } from './filters/json.js';
import { filterLength } from './filters/length.js';
import { filterLower } from './filters/lower.js';
import { filterSafe } from './filters/safe.js';
import { filterTruncatechars } from './filters/truncatechars.js';
import { filterUpper } from './filters/upper.js';
import { filterUrlencode } from './filters/urlencode.js';

import { autoescapeTag } from './tags/autoescape.js';
import { commentTag } from './tags/comment.js';
import { forTag } from './tags/for.js';
import { ifTag } from './tags/if.js';
import {
  blockTag,
  extendsTag,
  includeTag,
} from './tags/loader-tags.js';
import { verbatimTag } from './tags/verbatim.js';
import { withTag } from './tags/with.js';

/**
 * The tags and filters every engine loads unless `builtins: false`.
 */
export const createBuiltinLibrary = (): Library => {
  return new Library()
    .tag('autoescape', autoescapeTag)
    .tag('block', blockTag)
    .tag('comment', commentTag)
    .tag('extends', extendsTag)
    .tag('for', forTag)
    .tag('if', ifTag)
    .tag('include', includeTag)
    .tag('verbatim', verbatimTag)
    .tag('with', withTag)
    .filter('date', filterDate, { expectsLocaltime: true, optionalArgs: 1 })
    .filter('default', filterDefault)
    .filter('escape', filterEscape, { isSafe: true })
    .filter('join', filterJoin, { isSafe: true, needsAutoescape: true })
    .filter('json', filterJson)
    .filter('length', filterLength)
    .filter('lower', filterLower)
    .filter('safe', filterSafe, { isSafe: true })
    .filter('truncatechars', filterTruncatechars, { isSafe: true })
    .filter('upper', filterUpper)
    .filter('urlencode', filterUrlencode, { optionalArgs: 1 });
};
