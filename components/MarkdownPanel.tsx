import React from 'react';
import ReactMarkdown from 'react-markdown';

interface PanelImage {
  src: string;
  alt: string;
}

interface MarkdownPanelProps {
  title: string;
  content: string;
  accent: string;
  image?: PanelImage;
}

const MarkdownPanel: React.FC<MarkdownPanelProps> = ({ title, content, accent, image }) => (
  <div className="bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden">
    <div className="px-5 py-3 text-white font-bold" style={{ backgroundColor: accent }}>{title}</div>
    <div className={image ? 'grid grid-cols-1 md:grid-cols-3 gap-6 p-5' : 'p-5'}>
      <div className="prose prose-slate max-w-none md:col-span-2">
        <ReactMarkdown>{content}</ReactMarkdown>
      </div>
      {image && (
        <figure className="flex items-center justify-center">
          <img src={image.src} alt={image.alt} className="w-full max-w-xs rounded-lg" />
        </figure>
      )}
    </div>
  </div>
);

export default MarkdownPanel;
