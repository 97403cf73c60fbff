import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeRaw from "rehype-raw";
import { visit } from "unist-util-visit";
import GitHubSlugger from "github-slugger";
import matter from "gray-matter";
import type { Element, Root } from "hast";

export interface Link {
  /** the href or src as written in the markdown */
  url: string;
  node: Element;
  property: "href" | "src";
}

export interface Document {
  /** the Markdown file itself, without front matter */
  content: string;

  /** the html tree, with ids on every heading */
  tree: Root;

  /** the slugs of the headings found in this markdown file */
  headings: Array<string>;

  /** every link and image source in document order */
  links: Array<Link>;

  frontMatter: {
    title?: string;
    description?: string;
  };

  /** from an `<!-- EditURL: ... -->` annotation */
  editUrl?: string;
}

const EDIT_URL = /<!--\s*EditURL:\s*(\S+)\s*-->/;

const HEADING = /^h[1-6]$/;

/** Create a processor that turns markdown into an html tree */
const markdownProcessor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeRaw);

// Concatenates the text of all children, so headings with inline code
// blocks or emphasis still produce one slug.
const textContent = (node: Element): string => {
  let text = "";
  visit(node, "text", (textNode) => {
    text += textNode.value;
  });
  return text;
};

/** Gives every heading an id and returns the ids in document order */
const assignHeadingIds = (tree: Root): Array<string> => {
  const slugger = new GitHubSlugger();
  const headings: Array<string> = [];

  visit(tree, "element", (node) => {
    if (!HEADING.test(node.tagName)) {
      return;
    }
    const { id } = node.properties;
    const slug =
      typeof id === "string" && id ? id : slugger.slug(textContent(node));
    node.properties.id = slug;
    headings.push(slug);
  });

  return headings;
};

const collectLinks = (tree: Root): Array<Link> => {
  const links: Array<Link> = [];

  visit(tree, "element", (node) => {
    const property =
      node.tagName === "a" ? "href" : node.tagName === "img" ? "src" : undefined;
    if (!property) {
      return;
    }
    const url = node.properties[property];
    if (typeof url === "string" && url) {
      links.push({ url, node, property });
    }
  });

  return links;
};

const readFrontMatter = (
  data: Record<string, unknown>
): Document["frontMatter"] => ({
  title: typeof data.title === "string" ? data.title : undefined,
  description:
    typeof data.description === "string" ? data.description : undefined,
});

export async function parseMarkdown(markdown: string): Promise<Document> {
  const { content, data } = matter(markdown);
  const tree = await markdownProcessor.run(markdownProcessor.parse(content));
  const editUrl = EDIT_URL.exec(content)?.[1];

  return {
    content,
    tree,
    headings: assignHeadingIds(tree),
    links: collectLinks(tree),
    frontMatter: readFrontMatter(data),
    editUrl,
  };
}

export function setLink(link: Link, url: string): void {
  link.node.properties[link.property] = url;
}
